import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config/appConfig';
import { getDatabase } from './config/database';
import { runMigrations } from './database/migrations';
import { buildServices } from './services';

// Load environment variables
dotenv.config();

async function startServer(): Promise<void> {
  try {
    console.log('🔧 Initializing services...');
    const config = loadConfig();

    console.log('📊 Setting up database...');
    const db = await getDatabase(config.databasePath);
    await runMigrations(db);

    const app = createApp(buildServices(db, config));

    app.listen(config.port, () => {
      console.log(`🚀 Server running on port ${config.port}`);
      console.log(`🏥 Health check: http://localhost:${config.port}/health`);
      console.log(`📚 API endpoints: http://localhost:${config.port}/api`);
    });
  } catch (error) {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}

void startServer();
