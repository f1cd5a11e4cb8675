import { PageBody, PageHeader } from '~/components/ui/page';

import { CardsEditor } from './_components/cards-editor';

export default function AllCardsPage() {
    return (
        <>
            <PageHeader
                title="All business cards"
                description="Review, correct and export every stored card."
            />

            <PageBody>
                <CardsEditor />
            </PageBody>
        </>
    );
}
