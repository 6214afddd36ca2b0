export type { ConfigProvider } from './types';
export { EnvConfigProvider, StaticConfigProvider } from './env-config';
export { MissingConfigError } from './errors';
