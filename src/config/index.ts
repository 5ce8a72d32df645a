export { ConfigLoader, CONFIG_FILE_NAME, ENV_PREFIX } from './ConfigLoader';
export * from './schemas/config.schema';
