import type { ReactNode } from 'react';
import { FolderOpen, Upload } from 'lucide-react';
import { z } from 'zod';

import pathsConfig from '~/config/paths.config';

const iconClasses = 'w-4';

const NavigationConfigSchema = z.object({
  routes: z
    .array(
      z.object({
        label: z.string().min(1),
        path: z.string().startsWith('/'),
        Icon: z.custom<ReactNode>(),
      }),
    )
    .min(1),
});

export type NavigationRoute = z.infer<typeof NavigationConfigSchema>['routes'][number];

const routes = [
  {
    label: 'Upload Card',
    path: pathsConfig.app.upload,
    Icon: <Upload className={iconClasses} />,
  },
  {
    label: 'View All Cards',
    path: pathsConfig.app.cards,
    Icon: <FolderOpen className={iconClasses} />,
  },
] satisfies NavigationRoute[];

export const navigationConfig = NavigationConfigSchema.parse({ routes });
