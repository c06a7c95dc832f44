import { PACKAGE_VERSION } from '../utils/version';

export const APP_NAME = 'docs-snapshot';
export const APP_VERSION = PACKAGE_VERSION;

export const USER_AGENT = `Mozilla/5.0 (compatible; ${APP_NAME}/${APP_VERSION})`;

export const DEFAULT_START_URL = 'https://docs.openclaw.ai/';
export const DEFAULT_OUTPUT_FILE = 'docs.md';
export const DEFAULT_TIMEOUT_SECONDS = 20;

export const MAX_REDIRECTIONS = 5;

export const NO_CONTENT_PLACEHOLDER = '[No extractable content found]';
export const PAGE_SEPARATOR = '---';
