/**
 * File Schema Cache
 * Layer: Infrastructure
 * Pattern: Adapter (implements ISchemaCache)
 *
 * The enriched schema lives in `<SCHEMA_CACHE_DIR>/enriched_schema.json` as
 * pretty-printed JSON so it can be reviewed (and hand-edited) between the
 * digest and the chat. Loading re-validates the file with Zod.
 */
import fs from 'fs';
import path from 'path';
import { inject, injectable } from 'tsyringe';

import type { AppConfig } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { EnrichedSchema } from '@domain/entities/EnrichedSchema';
import type { ISchemaCache } from '@domain/interfaces/ISchemaCache';
import { ENRICHED_SCHEMA_FILE } from '@shared/constants';
import { AppError, errorMessage } from '@shared/errors/AppError';
import { enrichedSchemaSchema } from '@shared/schemas';

@injectable()
export class FileSchemaCache implements ISchemaCache {
  readonly location: string;

  constructor(
    @inject(TOKENS.Config) settings: AppConfig,
    @inject(TOKENS.Logger) private log: Logger,
  ) {
    this.location = path.join(settings.schema.cacheDir, ENRICHED_SCHEMA_FILE);
  }

  exists(): boolean {
    return fs.existsSync(this.location);
  }

  async load(): Promise<EnrichedSchema | null> {
    if (!this.exists()) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(await fs.promises.readFile(this.location, 'utf8'));
    } catch (err) {
      throw new AppError(
        `Could not read schema cache ${this.location} (${errorMessage(err)}). Delete it and run the digest again`,
        500,
      );
    }

    const parsed = enrichedSchemaSchema.safeParse(raw);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .slice(0, 3)
        .map((issue) => `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new AppError(
        `Schema cache ${this.location} is invalid (${detail}). Delete it and run the digest again`,
        500,
      );
    }

    this.log.debug({ file: this.location, tables: Object.keys(parsed.data.tables).length }, 'Schema cache loaded');
    return parsed.data;
  }

  async save(schema: EnrichedSchema): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.location), { recursive: true });
    await fs.promises.writeFile(this.location, `${JSON.stringify(schema, null, 2)}\n`, 'utf8');
    this.log.info({ file: this.location, tables: Object.keys(schema.tables).length }, 'Enriched schema saved');
  }
}
