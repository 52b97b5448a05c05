import { loadTransferApiServiceEnv } from '@mobiremit/config';
import { closeDb } from '@mobiremit/db';
import { runServiceAndExit } from '@mobiremit/http';
import { buildTransferApiApp } from './app.js';
import { SERVICE_NAME } from './logger.js';

const env = loadTransferApiServiceEnv();

runServiceAndExit({
  serviceName: SERVICE_NAME,
  buildApp: () => buildTransferApiApp({ env }),
  port: env.TRANSFER_API_PORT,
  host: env.TRANSFER_API_HOST,
  onShutdown: closeDb
});
