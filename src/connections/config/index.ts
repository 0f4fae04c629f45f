export { loadConfig } from './app.config';
export type {
  AppConfig,
  DbConfig,
  EmailConfig,
  JwtAlgorithm,
  JwtConfig,
  RedisConfig,
  StorageConfig,
  StorageType,
} from './app.config';
