#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig } from '../config/appConfig';
import { closeDatabase, getDatabase } from '../config/database';
import { runMigrations } from '../database/migrations';
import { buildServices } from '../services';
import { createProgram } from './program';

dotenv.config();

const program = createProgram(async () => {
  const config = loadConfig();
  const db = await getDatabase(config.databasePath);
  await runMigrations(db);
  return { services: buildServices(db, config), close: closeDatabase };
});

program.parseAsync(process.argv).catch(error => {
  console.error('❌ CLI failed:', error);
  process.exitCode = 1;
});
