/**
 * applink-doctor MCP Server — exports and stdio entry point.
 */

export { createServer } from './server.js';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { DiagnosticsEngine } from '../diagnostics/engine.js';
import { createServer } from './server.js';

/**
 * Start the MCP server on stdio transport.
 * Called from CLI: `applink-doctor mcp`
 */
export async function startStdioServer(engine: DiagnosticsEngine): Promise<void> {
  const server = createServer(engine);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
