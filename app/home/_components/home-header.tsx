'use client';

import Link from 'next/link';
import { usePathname } from 'next/navigation';
import { Contact } from 'lucide-react';

import { navigationConfig } from '~/config/navigation.config';
import pathsConfig from '~/config/paths.config';
import { cn } from '~/lib/utils';

export function HomeHeader() {
    const pathname = usePathname();

    return (
        <header className="relative flex h-16 items-center gap-6 border-b px-6">
            <Link href={pathsConfig.app.home} className="flex items-center gap-2 font-semibold">
                <Contact className="h-5 w-5 text-blue-600" />
                <span className="hidden sm:inline">Business Card OCR</span>
            </Link>

            <nav className="flex items-center gap-1">
                {navigationConfig.routes.map((route) => {
                    const active = pathname.startsWith(route.path);
                    return (
                        <Link
                            key={route.path}
                            href={route.path}
                            aria-current={active ? 'page' : undefined}
                            className={cn(
                                'flex items-center gap-2 rounded-md px-3 py-2 text-sm font-medium transition-colors hover:bg-accent',
                                active ? 'bg-accent text-accent-foreground' : 'text-muted-foreground',
                            )}
                        >
                            {route.Icon}
                            {route.label}
                        </Link>
                    );
                })}
            </nav>

            {/* Gradient accent line */}
            <div className="absolute bottom-0 left-4 right-4 h-0.5 bg-gradient-to-r from-blue-600 via-blue-400 to-cyan-500 rounded-full opacity-60" />
        </header>
    );
}
