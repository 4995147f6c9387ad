import { describe, expect, it } from "vitest";

import { loadAppConfig, loadContactInfo } from "./env-config";

describe("loadContactInfo", () => {
  it("keeps only the fields that are set", () => {
    expect(
      loadContactInfo({
        CONTACT_EMAIL: " jane@example.com ",
        CONTACT_PHONE: "",
        CONTACT_LINKEDIN: "linkedin.com/in/jane",
      }),
    ).toEqual({ email: "jane@example.com", linkedin: "linkedin.com/in/jane" });
  });
});

describe("loadAppConfig", () => {
  it("falls back to the OpenAI defaults", () => {
    expect(loadAppConfig({})).toEqual({
      apiKey: undefined,
      apiBaseUrl: "https://api.openai.com/v1",
      defaultModel: "gpt-4o",
      contact: {},
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadAppConfig({
      OPENAI_API_KEY: "test-secret",
      OPENAI_BASE_URL: "http://localhost:8080/v1//",
      OPENAI_MODEL: "gpt-4o-mini",
      CONTACT_WEBSITE: "example.dev",
    });

    expect(config).toEqual({
      apiKey: "test-secret",
      apiBaseUrl: "http://localhost:8080/v1",
      defaultModel: "gpt-4o-mini",
      contact: { website: "example.dev" },
    });
  });

  it("returns a frozen snapshot", () => {
    const env: Record<string, string | undefined> = { CONTACT_EMAIL: "jane@example.com" };
    const config = loadAppConfig(env);
    env.CONTACT_EMAIL = "changed@example.com";

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.contact)).toBe(true);
    expect(config.contact.email).toBe("jane@example.com");
  });
});
