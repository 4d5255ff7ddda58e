import { info } from 'firebase-functions/logger';
import { loadConfig } from './config.js';
import { openDatabase } from './db/index.js';
import { createApp } from './app.js';

const config = loadConfig();
const db = openDatabase(config.databasePath);
const { app } = createApp({ config, db });

app.listen(config.port, (): void => {
  info('Server listening', {
    url: `http://localhost:${String(config.port)}`,
    database: config.databasePath,
  });
});

export { app };
