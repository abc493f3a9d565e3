export { envSchema, parseEnv, loadConfig } from "./env.js";
