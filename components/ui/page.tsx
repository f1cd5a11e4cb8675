import type { ReactNode } from 'react';

export function PageHeader({ title, description, children }: {
    title: string;
    description?: string;
    children?: ReactNode;
}) {
    return (
        <div className="flex flex-col gap-4 border-b px-6 py-5 sm:flex-row sm:items-center sm:justify-between">
            <div className="space-y-1">
                <h1 className="text-2xl font-semibold tracking-tight">{title}</h1>
                {description && <p className="text-sm text-muted-foreground">{description}</p>}
            </div>
            {children}
        </div>
    );
}

export function PageBody({ children }: { children: ReactNode }) {
    return <div className="flex flex-1 flex-col space-y-6 px-6 py-6">{children}</div>;
}
