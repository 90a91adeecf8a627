import os from 'node:os';

export const VERSION = '__VERSION__ (__GIT_BRANCH__/__GIT_COMMIT__) __SYSTEM_INFO__';
export const PROGRAM_NAME = 'refinery';
export const PIPELINE_VERSION = '0.3';
export const DEFAULT_CHARACTER_ENCODING = 'utf-8';

export const DEFAULT_VERBOSE = false;
export const DEFAULT_DEBUG = false;
export const DEFAULT_DRY_RUN = false;

export const DEFAULT_CONFIG_DIR = `./.${PROGRAM_NAME}`;
export const DEFAULT_CONFIG_FILE = `${DEFAULT_CONFIG_DIR}/config.yaml`;
export const DEFAULT_OUTPUT_DIRECTORY = './output';
export const DEFAULT_INTERMEDIATE_DIRECTORY = './output/intermediate';
export const DEFAULT_MEDIA_DIRECTORY = './output/media';
export const DEFAULT_TEMP_DIRECTORY = os.tmpdir();

export const DEFAULT_ASR_MODEL = 'openai/gpt-4o-transcribe';
export const FALLBACK_ASR_MODEL = 'openai/whisper-1';
export const DEFAULT_REFINE_MODEL = 'zai/glm-4.7-flash';
export const DEFAULT_STYLES = ['summary'];
export const DEFAULT_LANGUAGE = 'English';

// Async slots for network/API work; process workers for ffmpeg.
export const DEFAULT_MAX_ASYNC_WORKERS = 4;
export const DEFAULT_MAX_PROCESS_WORKERS = 2;

// Refinement chunk size, counted in words.
export const DEFAULT_CHUNK_SIZE = 70000;

export const DEFAULT_MAX_CHUNK_DURATION_SECONDS = 600;
export const SHORT_CHUNK_THRESHOLD_SECONDS = 30;
export const MIN_CHUNK_DURATION_SHORT_SECONDS = 5;
export const MIN_CHUNK_DURATION_SECONDS = 30;

export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_BASE_DELAY_MS = 1000;
export const MAX_RETRY_AFTER_MS = 60000;
export const DEFAULT_FETCH_TIMEOUT_MS = 30000;

export const MAX_TITLE_LENGTH = 80;
export const MAX_TAGS = 5;
export const MAX_DESCRIPTION_LENGTH = 140;

export const RAW_TRANSCRIPT_SUFFIX = '_raw_transcript.txt';
export const METADATA_SUFFIX = '.meta.json';
export const SOURCE_MEDIA_SUFFIX = '_source_audio';

export const MEDIA_EXTENSIONS = ['.mp3', '.m4a', '.wav', '.aac', '.ogg', '.flac', '.mp4', '.mkv', '.mov', '.avi', '.webm'];
export const AUDIO_URL_EXTENSIONS = ['.mp3', '.m4a', '.wav', '.aac', '.ogg', '.flac', '.mp4'];
export const DOCUMENT_EXTENSIONS = ['.txt', '.md', '.markdown', '.html', '.htm', '.pdf', '.docx'];
// Binary formats with no text extractor.
export const UNSUPPORTED_DOCUMENT_EXTENSIONS = [
    '.doc', '.ppt', '.pptx', '.xls', '.xlsx', '.odt', '.epub', '.zip', '.gz',
    '.png', '.jpg', '.jpeg', '.gif', '.webp', '.bmp', '.svg', '.ico', '.exe', '.dmg', '.iso',
];

export const PROVIDER_ENV_KEYS = {
    openai: 'OPENAI_API_KEY',
    deepseek: 'DEEPSEEK_API_KEY',
    zai: 'ZAI_API_KEY',
    gemini: 'GEMINI_API_KEY',
} as const;

export const PROVIDER_BASE_URLS = {
    openai: undefined,
    deepseek: 'https://api.deepseek.com',
    zai: 'https://api.z.ai/api/paas/v4',
    gemini: 'https://generativelanguage.googleapis.com/v1beta/openai/',
} as const;
