import { readFile } from 'node:fs/promises';
import { targetProfileSchema, type TargetProfile } from '@corroborate/schemas';
import bundledProfile from '../../data/target-profile.json';

/** Validate a profile object; throws a ZodError listing every invalid field. */
export function parseTargetProfile(raw: unknown): TargetProfile {
  return targetProfileSchema.parse(raw);
}

/** The bundled profile (agents/data/target-profile.json). */
export function defaultTargetProfile(): TargetProfile {
  return parseTargetProfile(bundledProfile);
}

export async function readTargetProfile(path: string): Promise<TargetProfile> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  return parseTargetProfile(raw);
}
