import { describe, expect, it } from "vitest";

import { buildGenerationRequest, buildPrompt, contactLines, SYSTEM_PROMPT } from "./prompt";

describe("contactLines", () => {
  it("labels the non-empty fields in a fixed order", () => {
    expect(
      contactLines({
        website: "example.dev",
        email: "jane@example.com",
        linkedin: "linkedin.com/in/jane",
      }),
    ).toEqual(["Email: jane@example.com", "LinkedIn: linkedin.com/in/jane", "Website: example.dev"]);
  });

  it("skips blank values", () => {
    expect(contactLines({ email: "  ", phone: "+1 555 0100" })).toEqual(["Phone: +1 555 0100"]);
  });
});

describe("buildPrompt", () => {
  const resume = "Built payment APIs in Python for 5 years.\nLed a team of 4.";
  const job = "Senior Python role (remote) - {payments} & <billing>";

  it("embeds both texts verbatim", () => {
    const prompt = buildPrompt(resume, job, {});
    expect(prompt).toContain(`RESUME:\n${resume}\n`);
    expect(prompt).toContain(`JOB DESCRIPTION:\n${job}\n`);
  });

  it("asks for every contact line at the end of the letter", () => {
    const prompt = buildPrompt(resume, job, {
      email: "jane@example.com",
      phone: "+1 555 0100",
      linkedin: "linkedin.com/in/jane",
    });
    expect(prompt).toContain(
      [
        "End the letter with the following 3 separate lines, exactly as written:",
        "Email: jane@example.com",
        "Phone: +1 555 0100",
        "LinkedIn: linkedin.com/in/jane",
      ].join("\n"),
    );
  });

  it("uses the singular form for a single contact line", () => {
    const prompt = buildPrompt(resume, job, { email: "jane@example.com" });
    expect(prompt).toContain("End the letter with the following line, exactly as written:\nEmail: jane@example.com\n");
  });

  it("leaves out the sign-off instruction without contact details", () => {
    expect(buildPrompt(resume, job, {})).not.toContain("End the letter with");
  });

  it("steers the tone", () => {
    const prompt = buildPrompt(resume, job, {});
    expect(prompt).toContain("humanized, natural, and conversational, not like typical AI-generated text");
    expect(prompt).toContain("- No em dashes.");
  });

  it("is deterministic", () => {
    const contact = { email: "jane@example.com" };
    expect(buildPrompt(resume, job, contact)).toBe(buildPrompt(resume, job, contact));
  });
});

describe("buildGenerationRequest", () => {
  it("pairs the system prompt with the user prompt and fixed parameters", () => {
    const request = buildGenerationRequest({
      resume: "R",
      jobDescription: "J",
      contact: {},
      model: "gpt-4o-mini",
    });

    expect(request.model).toBe("gpt-4o-mini");
    expect(request.temperature).toBe(0.7);
    expect(request.maxTokens).toBe(1000);
    expect(request.messages).toEqual([
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: buildPrompt("R", "J", {}) },
    ]);
  });
});
