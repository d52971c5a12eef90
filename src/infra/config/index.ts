export { parseEnv, createConfig, EnvSchema, type AppConfig, type Env, type DataSource } from './env.js';
