import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { type PersistedSettings, persistedSettingsSchema } from './app-config.schema';

export function loadPersistedSettings(settingsPath: string | undefined): PersistedSettings {
  if (settingsPath === undefined) {
    return {};
  }

  const absolutePath: string = resolve(process.cwd(), settingsPath);

  try {
    const raw: string = readFileSync(absolutePath, 'utf8');
    const parsed: unknown = JSON.parse(raw);

    return persistedSettingsSchema.parse(parsed);
  } catch (error: unknown) {
    const message: string = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load settings file ${absolutePath}: ${message}`);
  }
}
