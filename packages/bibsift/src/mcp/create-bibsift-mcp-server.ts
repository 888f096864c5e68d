import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { AppConfig } from '../config.js';
import type { Logger } from '../core/logger.js';
import { EXPORT_FORMATS } from '../export/types.js';
import { BibsiftError, errorMessage } from '../references/errors.js';
import { toFlatRecord } from '../references/reference-pipeline.js';
import type { ReferenceService } from '../references/reference-service.js';

const toToolError = (error: unknown): CallToolResult => {
  const fallbackMessage = 'Unknown bibsift error.';

  if (error instanceof BibsiftError) {
    return {
      isError: true,
      content: [{ type: 'text', text: error.message }],
      structuredContent: {
        error: error.name,
        message: error.message,
        details: error.details
      }
    };
  }

  if (error instanceof Error) {
    return {
      isError: true,
      content: [{ type: 'text', text: error.message }],
      structuredContent: {
        error: error.name,
        message: error.message
      }
    };
  }

  return {
    isError: true,
    content: [{ type: 'text', text: fallbackMessage }],
    structuredContent: {
      error: 'UnknownError',
      message: fallbackMessage
    }
  };
};

const jsonResult = (payload: Record<string, unknown>): CallToolResult => ({
  content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
  structuredContent: payload
});

const minConfidenceSchema = z
  .number()
  .min(0)
  .max(1)
  .optional()
  .describe('Drop references whose confidence score is below this value. Defaults to BIBSIFT_MIN_CONFIDENCE.');

export const createBibsiftMcpServer = (config: AppConfig, service: ReferenceService, logger: Logger): McpServer => {
  const server = new McpServer(
    {
      name: config.serverName,
      version: config.serverVersion,
      title: 'bibsift',
      description: 'Reference extraction and quality scoring for academic documents'
    },
    {
      capabilities: {
        logging: {}
      }
    }
  );

  server.registerTool(
    'extract_references_from_text',
    {
      title: 'Extract References From Text',
      description:
        'Segment raw document text into bibliography entries, parse them against APA/MLA/Chicago/IEEE grammars, deduplicate and score them.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: false
      },
      inputSchema: {
        text: z.string().min(1).describe('Raw document or bibliography text.'),
        min_confidence: minConfidenceSchema
      }
    },
    async ({ text, min_confidence }): Promise<CallToolResult> => {
      try {
        const outcome = service.extractFromText(text, { minConfidence: min_confidence });

        return jsonResult({
          total_found: outcome.totalFound,
          kept: outcome.references.length,
          discarded: outcome.discarded,
          references: outcome.references.map(toFlatRecord)
        });
      } catch (error) {
        logger.warn('Text reference extraction failed', {
          tool: 'extract_references_from_text',
          error: errorMessage(error)
        });
        return toToolError(error);
      }
    }
  );

  server.registerTool(
    'extract_references_from_document',
    {
      title: 'Extract References From Document',
      description:
        'Extract text from a local PDF, image or text file using the configured backends, keep the best extraction and return its scored references. Optionally writes export files.',
      annotations: {
        readOnlyHint: false,
        openWorldHint: false
      },
      inputSchema: {
        path: z.string().min(1).describe('Local absolute or workspace-relative document path.'),
        min_confidence: minConfidenceSchema,
        output_path: z
          .string()
          .min(1)
          .optional()
          .describe('Base path for export files, without extension. Nothing is written when omitted.'),
        formats: z.array(z.enum(EXPORT_FORMATS)).min(1).optional().describe('Export formats to write.')
      }
    },
    async ({ path, min_confidence, output_path, formats }): Promise<CallToolResult> => {
      try {
        const outcome = await service.extractFromDocument(path, {
          minConfidence: min_confidence,
          outputPath: output_path,
          formats
        });

        return jsonResult({
          document_path: outcome.documentPath,
          backend: outcome.backend,
          ocr: outcome.ocr,
          text_quality: outcome.textQuality,
          attempts: outcome.attempts,
          total_found: outcome.totalFound,
          kept: outcome.references.length,
          discarded: outcome.discarded,
          output_files: outcome.outputFiles,
          processing_time_ms: outcome.processingTimeMs,
          references: outcome.references.map(toFlatRecord)
        });
      } catch (error) {
        logger.warn('Document reference extraction failed', {
          tool: 'extract_references_from_document',
          path,
          error: errorMessage(error)
        });
        return toToolError(error);
      }
    }
  );

  server.registerTool(
    'format_references',
    {
      title: 'Format References',
      description: 'Extract references from text and render them as JSON, CSV, plain text, Markdown or BibTeX without writing files.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: false
      },
      inputSchema: {
        text: z.string().min(1).describe('Raw document or bibliography text.'),
        format: z.enum(EXPORT_FORMATS).describe('Output format.'),
        min_confidence: minConfidenceSchema
      }
    },
    async ({ text, format, min_confidence }): Promise<CallToolResult> => {
      try {
        const outcome = service.extractFromText(text, { minConfidence: min_confidence });
        const output = service.renderReferences(outcome.references, format);

        return {
          content: [{ type: 'text', text: output }],
          structuredContent: {
            format,
            reference_count: outcome.references.length,
            output
          }
        };
      } catch (error) {
        logger.warn('Reference formatting failed', {
          tool: 'format_references',
          format,
          error: errorMessage(error)
        });
        return toToolError(error);
      }
    }
  );

  server.registerTool(
    'get_processing_statistics',
    {
      title: 'Get Processing Statistics',
      description: 'Report documents processed, references kept, average confidence and recorded document errors.',
      annotations: {
        readOnlyHint: true,
        openWorldHint: false
      },
      inputSchema: {}
    },
    async (): Promise<CallToolResult> => {
      const statistics = service.getStatistics();

      return jsonResult({
        documents_processed: statistics.documentsProcessed,
        references_extracted: statistics.referencesExtracted,
        average_confidence: statistics.averageConfidence,
        errors: statistics.errors
      });
    }
  );

  return server;
};
