import { createServer } from 'http';
import { AppConfig, ConfigError, loadConfig } from './config/env';
import { createApp } from './app';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();
const { app } = createApp(config);
const httpServer = createServer(app);

function shutdown(signal: string): void {
  console.log(`${signal} received, closing server...`);
  httpServer.close(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

// Start server
httpServer.listen(config.port, () => {
  console.log(`⚡️ Server is running on port ${config.port}`);
  console.log(`🎨 Icon layers API ready at http://localhost:${config.port}/api`);
});

export default app;
