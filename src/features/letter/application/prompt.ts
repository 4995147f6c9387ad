import { GENERATION_MAX_TOKENS, GENERATION_TEMPERATURE } from "../../../shared/constants";
import type { ContactInfo, GenerationRequest, JobDescriptionText, ResumeText } from "../../../shared/types";

export const SYSTEM_PROMPT =
  "You are an expert cover letter writer who creates natural, humanized, and conversational cover letters.";

const CONTACT_LABELS: Array<[keyof ContactInfo, string]> = [
  ["email", "Email"],
  ["phone", "Phone"],
  ["linkedin", "LinkedIn"],
  ["website", "Website"],
];

export function contactLines(contact: ContactInfo): string[] {
  const lines: string[] = [];
  for (const [key, label] of CONTACT_LABELS) {
    const value = contact[key]?.trim();
    if (value) {
      lines.push(`${label}: ${value}`);
    }
  }
  return lines;
}

function signOffInstruction(contact: ContactInfo): string[] {
  const lines = contactLines(contact);
  if (lines.length === 0) {
    return [];
  }
  const count = lines.length === 1 ? "line" : `${lines.length} separate lines`;
  return [`End the letter with the following ${count}, exactly as written:`, ...lines, ""];
}

export function buildPrompt(resume: ResumeText, jobDescription: JobDescriptionText, contact: ContactInfo): string {
  return [
    "Write a great cover letter for this job description. Use what you know from my resume to highlight my most relevant experiences and skills.",
    "Make the tone humanized, natural, and conversational, not like typical AI-generated text. Keep it professional but approachable, with a strong narrative that shows why I'm a good fit.",
    "Do not use placeholders or bracketed fields of any kind (no [], <>, {}, ALL CAPS prompts like INSERT HERE, or 'to be filled later'). Write fully realized, final content.",
    "",
    ...signOffInstruction(contact),
    "RESUME:",
    resume,
    "",
    "JOB DESCRIPTION:",
    jobDescription,
    "",
    "Return only the complete cover letter text, without explanations or formatting notes.",
    "IMPORTANT:",
    "- No em dashes.",
    "- Do not emphasize my education; show the fit through my experience and skills. Leave out my GPA.",
    "- If the job description mentions a challenge the team is facing, explain how my experience can help with it.",
  ].join("\n");
}

export function buildGenerationRequest(params: {
  resume: ResumeText;
  jobDescription: JobDescriptionText;
  contact: ContactInfo;
  model: string;
}): GenerationRequest {
  return {
    model: params.model,
    messages: [
      { role: "system", content: SYSTEM_PROMPT },
      { role: "user", content: buildPrompt(params.resume, params.jobDescription, params.contact) },
    ],
    temperature: GENERATION_TEMPERATURE,
    maxTokens: GENERATION_MAX_TOKENS,
  };
}
