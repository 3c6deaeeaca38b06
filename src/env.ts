import { config } from "dotenv";

config();

export const DEFAULT_MODEL = "gpt-4o-mini";
export const DEFAULT_MAX_TOKENS = 1024;
export const DEFAULT_ASSISTANT_LABEL = "Claude";

export interface EnvSettings {
  openAiApiKey?: string;
  openAiBaseUrl?: string;
  model: string;
  maxTokens: number;
  workdir: string;
  assistantLabel: string;
  debugMode: boolean;
  logFile?: string;
}

function positiveInteger(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

/** Environment first, then flags; flags win. Unknown flags are ignored. */
export function readEnvSettings(
  env: NodeJS.ProcessEnv,
  argv: string[],
  cwd: string = process.cwd()
): EnvSettings {
  const settings: EnvSettings = {
    openAiApiKey: env.OPENAI_API_KEY || undefined,
    openAiBaseUrl: env.OPENAI_BASE_URL || undefined,
    model: env.OPENAI_MODEL || DEFAULT_MODEL,
    maxTokens: positiveInteger(env.OPENAI_MAX_TOKENS, DEFAULT_MAX_TOKENS),
    workdir: env.AGENT_WORKDIR || cwd,
    assistantLabel: env.ASSISTANT_LABEL || DEFAULT_ASSISTANT_LABEL,
    debugMode: env.DEBUG_MODE === "true",
    logFile: env.LOG_FILE || undefined,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    switch (arg) {
      case "--workdir":
        if (next) {
          settings.workdir = next;
          i++;
        }
        break;
      case "--model":
        if (next) {
          settings.model = next;
          i++;
        }
        break;
      case "--log-file":
        if (next) {
          settings.logFile = next;
          i++;
        }
        break;
      case "--debug-tools":
        settings.debugMode = true;
        break;
      case "--no-debug-tools":
        settings.debugMode = false;
        break;
      default:
        break;
    }
  }

  return settings;
}

export const ENV = readEnvSettings(process.env, process.argv.slice(2));

export const OPENAI_TEXT_MODEL = ENV.model;
export const OPENAI_MAX_TOKENS = ENV.maxTokens;
export const AGENT_WORKDIR = ENV.workdir;
export const ASSISTANT_LABEL = ENV.assistantLabel;
export const DEBUG_MODE = ENV.debugMode;
export const LOG_FILE = ENV.logFile;
