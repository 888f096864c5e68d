import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import type { Logger } from '../core/logger.js';
import { errorMessage } from '../references/errors.js';
import type { ExtractedReference } from '../references/types.js';
import { nowIso } from '../references/utils.js';
import { renderReferences } from './formatters.js';
import { FORMAT_EXTENSIONS, type ExportFormat, type ExportResult } from './types.js';

/** Writes one file per format next to `basePath`; a failed format does not stop the rest. */
export class ReferenceStore {
  constructor(
    private readonly logger: Logger,
    private readonly clock: () => string = nowIso
  ) {}

  async write(references: ExtractedReference[], basePath: string, formats: readonly ExportFormat[]): Promise<ExportResult> {
    const result: ExportResult = {};
    const context = { generatedAt: this.clock() };

    await fs.mkdir(dirname(basePath), { recursive: true });

    for (const format of new Set(formats)) {
      const filePath = `${basePath}.${FORMAT_EXTENSIONS[format]}`;
      try {
        await fs.writeFile(filePath, renderReferences(format, references, context), 'utf8');
        result[format] = filePath;
      } catch (error) {
        const message = errorMessage(error);
        this.logger.warn('Failed to write reference export', { format, filePath, error: message });
        result[format] = `Error: ${message}`;
      }
    }

    return result;
  }
}
