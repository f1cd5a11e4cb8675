import { z } from 'zod';

const PathsSchema = z.object({
  app: z.object({
    home: z.string().min(1),
    upload: z.string().min(1),
    cards: z.string().min(1),
  }),
});

const pathsConfig = PathsSchema.parse({
  app: {
    home: '/home',
    upload: '/home/upload',
    cards: '/home/cards',
  },
} satisfies z.infer<typeof PathsSchema>);

export default pathsConfig;
