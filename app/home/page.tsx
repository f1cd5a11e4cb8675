import { redirect } from 'next/navigation';

import pathsConfig from '~/config/paths.config';

export default function HomePage() {
    redirect(pathsConfig.app.upload);
}
