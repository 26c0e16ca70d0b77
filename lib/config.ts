import "dotenv/config";

export interface AppConfig {
  mouserApiKey: string | null;
  geminiApiKey: string | null;
  geminiModel: string;
  port: number;
}

const DEFAULT_GEMINI_MODEL = "models/gemini-2.5-flash";
const DEFAULT_PORT = 3000;

function readKey(env: NodeJS.ProcessEnv, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = Number.parseInt(env.PORT ?? "", 10);

  return {
    mouserApiKey: readKey(env, "MOUSER_API_KEY"),
    geminiApiKey: readKey(env, "GEMINI_API_KEY"),
    geminiModel: readKey(env, "GEMINI_MODEL") ?? DEFAULT_GEMINI_MODEL,
    port: Number.isFinite(port) && port > 0 ? port : DEFAULT_PORT
  };
}
