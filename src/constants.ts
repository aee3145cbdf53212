export const VERSION = '__VERSION__ (__GIT_BRANCH__/__GIT_COMMIT__) __SYSTEM_INFO__';
export const PROGRAM_NAME = 'meeting-insights';
export const DEFAULT_CHARACTER_ENCODING = 'utf-8';

export const DEFAULT_VERBOSE = false;
export const DEFAULT_DEBUG = false;

export const DEFAULT_CONFIG_DIR = `./.${PROGRAM_NAME}`;
export const DEFAULT_CONFIG_FILE_NAME = 'config.yaml';

// Completion backend. Defaults target a local Ollama server speaking the OpenAI protocol.
export const DEFAULT_BASE_URL = 'http://localhost:11434/v1';
export const DEFAULT_LOCAL_API_KEY = 'ollama';
export const DEFAULT_MODEL = 'qwen2.5:32b';
export const DEFAULT_RESEARCH_MODEL = 'gpt-4o';
export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_MAX_TOKENS = 2000;

// Transcript analysis
export const DEFAULT_INPUT_DIRECTORY = 'transcripts';
export const DEFAULT_OUTPUT_DIRECTORY = 'output';
export const TRANSCRIPT_EXTENSION = '.md';
export const DEFAULT_FAILURE_MODE = 'lenient';
export const DEFAULT_TAXONOMY = 'standard';
export const DEFAULT_MAX_REVIEW_ROUNDS = 1;
export const DEFAULT_AUTO = false;
export const DEFAULT_NORMALIZE_TRANSCRIPT = false;

export const STAGES = {
    analysis: '1_analysis',
    final: '2_final_output',
    iteration: '3_iteration',
} as const;

export const MANUAL_QUOTE = 'Manually entered';
export const MANUAL_SPEAKER = 'Manual Entry';
export const UNKNOWN_SPEAKER = 'Unknown';

// Research
export const DEFAULT_RESEARCH_DIRECTORY = 'research_output';
export const DEFAULT_SEARCH_MAX_RESULTS = 3;
export const DEFAULT_MAX_AGENT_STEPS = 8;
export const DEFAULT_MAX_CONTEXT_CHARS = 16000;
export const MAX_SLUG_LENGTH = 50;
export const TAVILY_API_URL = 'https://api.tavily.com';

export const APP_DEFAULTS = {
    verbose: DEFAULT_VERBOSE,
    debug: DEFAULT_DEBUG,
    baseUrl: DEFAULT_BASE_URL,
    model: DEFAULT_MODEL,
    researchModel: DEFAULT_RESEARCH_MODEL,
    temperature: DEFAULT_TEMPERATURE,
    maxTokens: DEFAULT_MAX_TOKENS,
    inputDirectory: DEFAULT_INPUT_DIRECTORY,
    outputDirectory: DEFAULT_OUTPUT_DIRECTORY,
    failureMode: DEFAULT_FAILURE_MODE,
    taxonomy: DEFAULT_TAXONOMY,
    maxReviewRounds: DEFAULT_MAX_REVIEW_ROUNDS,
    auto: DEFAULT_AUTO,
    normalizeTranscript: DEFAULT_NORMALIZE_TRANSCRIPT,
    researchDirectory: DEFAULT_RESEARCH_DIRECTORY,
    searchMaxResults: DEFAULT_SEARCH_MAX_RESULTS,
    maxAgentSteps: DEFAULT_MAX_AGENT_STEPS,
    maxContextChars: DEFAULT_MAX_CONTEXT_CHARS,
};
