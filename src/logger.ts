import { getLogger, type Logger } from '@logtape/logtape';

// Nothing is emitted unless the host application calls LogTape's `configure()`.
export const LOG_CATEGORY = 'odata-multipart-batch';

export function getBatchLogger(...subcategory: string[]): Logger {
  return getLogger([LOG_CATEGORY, ...subcategory]);
}
