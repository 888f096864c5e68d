import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { AppConfig } from '../config.js';
import type { Logger } from '../core/logger.js';
import type { ReferenceService } from '../references/reference-service.js';
import { createBibsiftMcpServer } from './create-bibsift-mcp-server.js';

export const startStdioServer = async (config: AppConfig, service: ReferenceService, logger: Logger): Promise<void> => {
  const server = createBibsiftMcpServer(config, service, logger);
  const transport = new StdioServerTransport();

  await server.connect(transport);
  logger.info('bibsift stdio transport ready');
};
