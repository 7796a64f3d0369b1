export { envSchema, parseEnv } from "./env.js";
export type { Env } from "./env.js";
