import { createRequire } from 'node:module';
import { z } from 'zod';

const require = createRequire(import.meta.url);

const manifestSchema = z.object({
  version: z.string().trim().min(1)
});

export const getPackageVersion = (): string => {
  try {
    const manifest = manifestSchema.safeParse(require('../package.json'));
    if (manifest.success) {
      return manifest.data.version;
    }
  } catch {
    // Fall through to static fallback.
  }

  return '0.0.0';
};
