export type ResumeText = string;
export type JobDescriptionText = string;

export type TextSourceKind = "pdf" | "text";

export interface ContactInfo {
  email?: string;
  phone?: string;
  linkedin?: string;
  website?: string;
}

export interface AppConfig {
  apiKey?: string;
  apiBaseUrl: string;
  defaultModel: string;
  contact: Readonly<ContactInfo>;
}

export type InputOrigin =
  | {
      kind: "file";
      path: string;
      sourceKind: TextSourceKind;
    }
  | {
      kind: "literal";
    };

export interface ResolvedInputs {
  resume: ResumeText;
  jobDescription: JobDescriptionText;
  resumeOrigin: InputOrigin;
  jobDescriptionOrigin: InputOrigin;
}

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface GenerationRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
}

/** Plain-text cover letter returned by the remote service. */
export type GenerationResult = string;

/**
 * One request to a text-generation service. Implementations throw the
 * CliError subclasses from shared/errors on failure.
 */
export type TextCompleter = (request: GenerationRequest) => Promise<GenerationResult>;
