import { createObjectTypeTable, createTypeMapper } from '../core/type-mapper.js';
import { createLogger } from '../utils/logger.js';

export function typesCommand(): void {
  const logger = createLogger();
  const mapper = createTypeMapper();

  logger.info('--- Property Types ---');
  for (const rawType of mapper.supportedTypes()) {
    const mapping = mapper.mapType(rawType);
    if (!mapping) continue;
    const multiple = mapping.multiple ? ' (multiple)' : '';
    logger.info(`${rawType.padEnd(20)} ${mapping.type}/${mapping.fieldType}${multiple}`);
  }

  logger.info('');
  logger.info('--- Object Types ---');
  for (const [name, slug] of createObjectTypeTable()) {
    logger.info(`${name.padEnd(20)} ${slug}`);
  }
  logger.dim('Other object type names are sent to the API unchanged.');
}
