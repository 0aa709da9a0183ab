/**
 * Toolstream HTTP Server
 * Runs the Streamable HTTP transport until SIGINT or SIGTERM
 */

import { loadConfig } from './config/index.js';
import { ToolstreamHttpServer } from './server.js';
import { logger } from './utils/logger.js';
import chalk from './utils/chalk.js';

export async function runHttpServer(): Promise<void> {
  console.log(chalk.cyan('🌐 Starting Toolstream HTTP Server...'));

  try {
    const config = loadConfig();
    config.server.mode = 'http';
    logger.setLogLevel(config.logging.level);

    console.log(chalk.bold('📡 Server configuration:'));
    console.log(`   Host: ${config.server.host}`);
    console.log(`   Port: ${config.server.port}`);
    console.log(`   Session timeout: ${config.session.timeoutMs / 1000}s`);
    console.log(`   Heartbeat interval: ${config.stream.heartbeatIntervalMs / 1000}s`);
    console.log(`   Stream queue: ${config.stream.maxQueueSize} frames (${config.stream.overflowPolicy})`);

    const server = new ToolstreamHttpServer(config);

    // Handle graceful shutdown
    const shutdown = async (): Promise<void> => {
      console.log(chalk.yellow('\n🛑 Shutting down HTTP server...'));
      try {
        await server.stop();
        console.log(chalk.green('✅ HTTP server stopped gracefully'));
        process.exit(0);
      } catch (error) {
        console.error(chalk.red('❌ Error during shutdown:'), error);
        process.exit(1);
      }
    };

    process.once('SIGINT', () => void shutdown());
    process.once('SIGTERM', () => void shutdown());

    await server.start();

    const base = `http://${config.server.host}:${config.server.port}`;
    console.log(chalk.green('✅ Toolstream HTTP Server is running!'));
    console.log(`🔗 MCP endpoint: ${chalk.underline(`${base}/mcp`)}`);
    console.log(`🔍 Health check: ${base}/health`);
    console.log('');
    console.log(chalk.bold('📋 Endpoints:'));
    console.log('   POST   /mcp                - JSON-RPC request (initialize creates a session)');
    console.log('   GET    /mcp                - Event stream (Accept: text/event-stream)');
    console.log('   DELETE /mcp                - Terminate session');
    console.log('   GET    /sse, POST /sse     - Legacy HTTP+SSE transport');
    console.log('   GET    /metrics            - Session and stream counts');
    console.log('   GET    /metrics/prometheus - Prometheus metrics');
    console.log('');
    console.log(chalk.dim('💡 Press Ctrl+C to stop the server'));
  } catch (error) {
    console.error(chalk.red('❌ Failed to start HTTP server:'), error);
    process.exit(1);
  }
}
