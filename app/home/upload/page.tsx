import { PageBody, PageHeader } from '~/components/ui/page';

import { CardUploader } from './_components/card-uploader';
import { ManualCardForm } from './_components/manual-card-form';

export default function UploadCardPage() {
    return (
        <>
            <PageHeader
                title="Upload Card"
                description="Upload → Extract OCR → Store → Download"
            />

            <PageBody>
                <CardUploader />
                <ManualCardForm />
            </PageBody>
        </>
    );
}
