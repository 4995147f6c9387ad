export const EXIT_OK = 0;
export const EXIT_UNEXPECTED = 1;
export const EXIT_USAGE = 2;
export const EXIT_CONFIG = 3;
export const EXIT_INPUT = 4;
export const EXIT_AUTH = 5;
export const EXIT_RATE_LIMIT = 6;
export const EXIT_OPENAI = 7;
export const EXIT_OUTPUT = 8;

export const DEFAULT_RESUME_PDF = "resume.pdf";
export const DEFAULT_RESUME_TEXT = "resume.txt";
export const DEFAULT_JOB_DESCRIPTION = "job_description.txt";
export const KNOWLEDGE_BASE_FILE = "knowledgeBase.txt";

export const DEFAULT_OPENAI_BASE_URL = "https://api.openai.com/v1";
export const DEFAULT_MODEL = "gpt-4o";
export const GENERATION_TEMPERATURE = 0.7;
export const GENERATION_MAX_TOKENS = 1000;
