import { createLogger } from '@reelvault/utils';

export const logger = createLogger({ package: 'storage' });
