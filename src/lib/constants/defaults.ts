/**
 * Default configuration constants for nginx-le-helper
 *
 * Centralized paths, markers and artifact names. Runtime values are resolved
 * once into a HelperConfig (see ../config.ts); nothing reads these ambiently.
 */

// nginx
export const DEFAULT_NGINX_CONF_DIR = '/etc/nginx/conf.d/';
export const NGINX_CONF_ENV = 'NGINX_CONF';
export const SERVER_NAME_DIRECTIVE = 'server_name';
export const CHALLENGE_MARKER = '/.well-known/acme-challenge';

// Layout under the home directory
export const LE_BASE_DIRNAME = 'letsencrypt';
export const CERTS_DIRNAME = 'certs';
export const CHALLENGE_DIRNAME = 'challenge';
export const RENEW_SCRIPT_FILENAME = 'renew_script.sh';

// Issuance tool
export const DEFAULT_ISSUER_COMMAND = 'simp_le';
export const ISSUER_COMMAND_ENV = 'SIMP_LE';
export const FULLCHAIN_FILENAME = 'fullchain.pem';
export const KEY_FILENAME = 'key.pem';
export const CERT_ARTIFACTS = [FULLCHAIN_FILENAME, KEY_FILENAME] as const;

// Reachability check
export const VERIFY_PATH = '/letsencrypt/challenge/';
export const VERIFY_EXPECTED_STATUS = 404;
export const VERIFY_TIMEOUT_MS = 200;
