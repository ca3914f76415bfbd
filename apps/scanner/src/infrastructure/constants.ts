export const APP_NAME = 'cdn-edge-scanner';

export const RESULT_FILE_NAME = 'result.txt';
export const CURSOR_FILE_NAME = 'cursor.json';
export const TUNNEL_TEMPLATE_FILE_NAME = 'tunnel-template.json';
export const OUTBOUND_TEMPLATE_FILE_NAME = 'outbound-template.json';
export const TUNNEL_CONFIG_FILE_NAME = 'tunnel-config.json';

/** Placeholder in `tunnel.args` replaced by the generated config path. */
export const CONFIG_PATH_PLACEHOLDER = '{config}';

export const DEFAULT_ENABLE_THRESHOLD = 10;

/** Characters of tunnel diagnostic output kept for error reports, split between head and tail. */
export const TUNNEL_OUTPUT_LIMIT_CHARS = 64 * 1024;
