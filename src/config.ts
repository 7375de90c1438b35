import "dotenv/config";
import { ConfigError } from "./errors";

type Env = Record<string, string | undefined>;

export type AppConfig = {
  botToken: string;
  mongoUri: string;
  inviteHost: string;
  port: number;
  env: string;
};

const DEFAULT_MONGODB_URI = "mongodb://127.0.0.1:27017/tomorrow_planner";

function requireEnv(env: Env, name: string): string {
  const value = env[name]?.trim();
  if (!value) throw new ConfigError(`Missing required env var: ${name}`);
  return value;
}

function getPort(env: Env): number {
  const raw = env.PORT;
  if (!raw) return 3000;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) throw new ConfigError(`Invalid PORT: ${raw}`);
  return n;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    botToken: requireEnv(env, "BOT_TOKEN"),
    mongoUri: env.MONGODB_URI?.trim() || DEFAULT_MONGODB_URI,
    inviteHost: env.INVITE_HOST?.trim() || "t.me",
    port: getPort(env),
    env: env.NODE_ENV ?? "development",
  };
}
