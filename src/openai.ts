import OpenAI from "openai";
import { ENV, type EnvSettings } from "./env";
import { ModelTransportError } from "./shared/errors";

type ClientSettings = Pick<EnvSettings, "openAiApiKey" | "openAiBaseUrl">;

let client: OpenAI | null = null;

export function createOpenAI(settings: ClientSettings): OpenAI {
  if (!settings.openAiApiKey) {
    throw new ModelTransportError("OPENAI_API_KEY is missing. Set it in your environment.");
  }
  return new OpenAI({ apiKey: settings.openAiApiKey, baseURL: settings.openAiBaseUrl });
}

/** Built on first use, so a session that never reaches the model needs no key. */
export function getOpenAI(): OpenAI {
  client ??= createOpenAI(ENV);
  return client;
}
