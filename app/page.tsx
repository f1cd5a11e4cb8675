import { redirect } from 'next/navigation';

import pathsConfig from '~/config/paths.config';

export default function RootPage() {
    redirect(pathsConfig.app.upload);
}
