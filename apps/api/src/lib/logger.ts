/**
 * Pino Logger Instance
 * 
 * The API shares the workspace logger so request logs and job logs land in
 * one stream.
 */

import { createLogger } from '@reelvault/utils';

export const logger = createLogger({ package: 'api' });
