import { z } from 'zod';

const DEFAULT_BACKEND_URL = 'https://business-card-scanner-backend.onrender.com';

const AppConfigSchema = z.object({
  backendUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, '')),
  timeouts: z.object({
    list: z.number().int().positive(),
    create: z.number().int().positive(),
    update: z.number().int().positive(),
    upload: z.number().int().positive(),
  }),
  upload: z.object({
    maxBytes: z.number().int().positive(),
    allowedExtensions: z.array(z.string().min(1)).min(1),
  }),
  saveConcurrency: z.number().int().min(1),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

const appConfig = AppConfigSchema.parse({
  backendUrl:
    process.env.NEXT_PUBLIC_BACKEND_URL || process.env.BACKEND_URL || DEFAULT_BACKEND_URL,
  timeouts: {
    list: 20_000,
    create: 20_000,
    update: 30_000,
    // OCR runs server-side before the record is stored
    upload: 120_000,
  },
  upload: {
    maxBytes: Math.floor(
      z.coerce.number().positive().catch(200).parse(process.env.NEXT_PUBLIC_MAX_UPLOAD_MB) * 1024 * 1024,
    ),
    allowedExtensions: ['jpg', 'jpeg', 'png'],
  },
  saveConcurrency: z.coerce
    .number()
    .int()
    .min(1)
    .catch(1)
    .parse(process.env.NEXT_PUBLIC_SAVE_CONCURRENCY),
} satisfies z.input<typeof AppConfigSchema>);

export default appConfig;
