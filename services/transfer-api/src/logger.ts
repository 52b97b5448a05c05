import { createServiceLogger } from '@mobiremit/observability';

export const SERVICE_NAME = 'transfer-api';

export const logger = createServiceLogger({ service: SERVICE_NAME });
