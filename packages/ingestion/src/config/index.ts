export {
  ENV_PREFIX,
  IngestionConfigSchema,
  checkIngestionConfig,
  loadIngestionConfig,
  resolveIngestionConfig,
  toEnvName,
} from './ingestion-config';
export type {
  IngestionConfig,
  IngestionConfigInput,
} from './ingestion-config';
