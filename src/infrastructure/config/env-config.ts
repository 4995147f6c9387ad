import path from "node:path";

import { config as loadEnvFile } from "dotenv";

import { DEFAULT_MODEL, DEFAULT_OPENAI_BASE_URL } from "../../shared/constants";
import type { AppConfig, ContactInfo } from "../../shared/types";

export type EnvSource = Record<string, string | undefined>;

function readEnv(env: EnvSource, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Loads `.env` from the working directory into process.env. Variables that
 * are already set are left alone.
 */
export function loadDotEnv(cwd: string): void {
  loadEnvFile({ path: path.join(cwd, ".env") });
}

export function loadContactInfo(env: EnvSource): ContactInfo {
  const contact: ContactInfo = {};
  const email = readEnv(env, "CONTACT_EMAIL");
  const phone = readEnv(env, "CONTACT_PHONE");
  const linkedin = readEnv(env, "CONTACT_LINKEDIN");
  const website = readEnv(env, "CONTACT_WEBSITE");
  if (email) {
    contact.email = email;
  }
  if (phone) {
    contact.phone = phone;
  }
  if (linkedin) {
    contact.linkedin = linkedin;
  }
  if (website) {
    contact.website = website;
  }
  return contact;
}

export function loadAppConfig(env: EnvSource): AppConfig {
  const baseUrl = readEnv(env, "OPENAI_BASE_URL") ?? DEFAULT_OPENAI_BASE_URL;
  return Object.freeze({
    apiKey: readEnv(env, "OPENAI_API_KEY"),
    apiBaseUrl: baseUrl.replace(/\/+$/, ""),
    defaultModel: readEnv(env, "OPENAI_MODEL") ?? DEFAULT_MODEL,
    contact: Object.freeze(loadContactInfo(env)),
  });
}
