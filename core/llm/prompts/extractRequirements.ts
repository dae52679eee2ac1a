import { PROMPT_REQUIREMENTS_VERSION } from "../../versioning/versions.js"

export function buildExtractRequirementsSystemPrompt(): string {
  return [
    "You are an HR expert extracting job requirements.",
    "Return only the essential technical requirements and skills, each as a short string.",
    "Output MUST be a JSON array of strings. No commentary."
  ].join("\n")
}

export function buildExtractRequirementsUserPrompt(jobText: string): string {
  return [
    `Prompt version: ${PROMPT_REQUIREMENTS_VERSION}`,
    "",
    "Job description:",
    "-----",
    jobText,
    "-----",
    "",
    'Return as JSON array: ["requirement1", "requirement2", "requirement3"]'
  ].join("\n")
}
