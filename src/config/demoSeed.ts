import { readFileSync } from 'fs';
import { join } from 'path';
import { ValidationError } from '@/errors';
import { DemoSeed, demoSeedSchema } from '@/validators/seed.validator';

export const DEFAULT_DEMO_SEED_PATH = join(__dirname, '../../data/demo-seed.json');

/**
 * Read and validate the demo seed file
 * Throws ValidationError when the file does not match the schema
 */
export function loadDemoSeed(filePath: string = DEFAULT_DEMO_SEED_PATH): DemoSeed {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
  const result = demoSeedSchema.safeParse(raw);

  if (!result.success) {
    throw new ValidationError(`Invalid demo seed file: ${filePath}`, result.error.issues);
  }

  return result.data;
}
