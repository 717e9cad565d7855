import { serve } from '@hono/node-server';
import { loadConfig } from './config.js';
import { openStore } from './db.js';
import { createApp } from './app.js';

const config = loadConfig();
const app = createApp(openStore(config.dbPath), {
  apiKey: config.apiKey,
  currency: config.currency,
});

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`Loan Amortization API v0.1.0 → http://localhost:${info.port}`);
});
