import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { logger } from './logger';

const PackageSchema = z.object({ version: z.string() });

let cachedVersion: string | null = null;

export function getVersion(packageJsonPath: string = path.join(process.cwd(), 'package.json')): string {
  if (cachedVersion !== null) {
    return cachedVersion;
  }
  try {
    const parsed = PackageSchema.safeParse(JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8')));
    cachedVersion = parsed.success ? parsed.data.version : 'unknown';
  } catch (error) {
    logger.warn(`Failed to read version from package.json: ${error}`);
    cachedVersion = 'unknown';
  }
  return cachedVersion;
}
