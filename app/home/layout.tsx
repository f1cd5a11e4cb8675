import type { ReactNode } from 'react';

import { HomeHeader } from './_components/home-header';

export default function HomeLayout({ children }: { children: ReactNode }) {
    return (
        <div className="flex min-h-screen flex-col">
            <HomeHeader />
            <main className="flex flex-1 flex-col">{children}</main>
        </div>
    );
}
