export const ENGINE_VERSION = "shortlist-engine@1.0.0"
export const PROMPT_ANALYZE_VERSION = "analyze-match@1"
export const PROMPT_REQUIREMENTS_VERSION = "extract-requirements@1"
