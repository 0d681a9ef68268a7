/**
 * Endpoints and client identity used when talking to GitHub and Copilot.
 * The header values mirror the VS Code Copilot Chat extension.
 */

export const CLIENT_ID = 'Iv1.b507a08c87ecfe98'; // VSCode GitHub Copilot OAuth app
export const OAUTH_SCOPE = 'read:user';
export const DEVICE_GRANT_TYPE = 'urn:ietf:params:oauth:grant-type:device_code';

export const DEVICE_CODE_URL = 'https://github.com/login/device/code';
export const ACCESS_TOKEN_URL = 'https://github.com/login/oauth/access_token';
export const COPILOT_TOKEN_URL = 'https://api.github.com/copilot_internal/v2/token';
export const DEFAULT_API_BASE = 'https://api.githubcopilot.com';

export const MODELS_DEV_URL = 'https://models.dev/api.json';
export const COPILOT_PROVIDER_ID = 'github-copilot';

export const USER_AGENT = 'GitHubCopilotChat/0.26.7';
export const EDITOR_VERSION = 'vscode/1.99.3';
export const EDITOR_PLUGIN_VERSION = 'copilot-chat/0.26.7';
export const INTEGRATION_ID = 'vscode-chat';

export const DEFAULT_MODEL = 'gpt-4.1';
export const DEFAULT_PROMPT = 'Say hello from GitHub Copilot.';
export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_VERIFY_LIMIT = 10;

/** Seconds added to the poll interval when GitHub answers `slow_down`. */
export const SLOW_DOWN_INCREMENT = 5;
