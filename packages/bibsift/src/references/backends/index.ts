import type { AppConfig } from '../../config.js';
import type { Logger } from '../../core/logger.js';
import { GrobidBackend } from './grobid-backend.js';
import { OcrSidecarBackend } from './ocr-sidecar-backend.js';
import { PdfParseBackend } from './pdf-parse-backend.js';
import { PlainTextBackend } from './plain-text-backend.js';
import type { TextExtractionBackend } from './types.js';

export type { BackendName, TextExtractionBackend } from './types.js';

export const createBackends = (config: AppConfig, logger: Logger): TextExtractionBackend[] => {
  const backends: TextExtractionBackend[] = [];

  for (const name of config.backends) {
    switch (name) {
      case 'pdf-parse': {
        backends.push(new PdfParseBackend());
        break;
      }
      case 'grobid': {
        if (!config.grobidUrl) {
          logger.debug('GROBID backend disabled: BIBSIFT_GROBID_URL is not set');
          break;
        }
        backends.push(new GrobidBackend(config.grobidUrl, config.backendTimeoutMs));
        break;
      }
      case 'ocr-sidecar': {
        if (!config.ocrSidecarUrl) {
          logger.debug('OCR backend disabled: BIBSIFT_OCR_SIDECAR_URL is not set');
          break;
        }
        backends.push(new OcrSidecarBackend(config.ocrSidecarUrl, config.backendTimeoutMs));
        break;
      }
      case 'plain-text': {
        backends.push(new PlainTextBackend());
        break;
      }
    }
  }

  return backends;
};
