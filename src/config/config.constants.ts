export const BOOLEAN_TRUE_VALUES = ['true', '1', 'yes', 'on'];

// Configuration defaults
export const DEFAULT_DATA_PATH = '/var/lib/cert-steward';
export const DEFAULT_API_HOST = '127.0.0.1';
export const DEFAULT_API_PORT = 8080;
export const MIN_API_KEY_LENGTH = 32;
export const DEFAULT_CLIENT_BINARY = 'certbot';
export const DEFAULT_CLIENT_INSTALL_COMMAND = 'apt-get install -y certbot';
export const DEFAULT_CONFIG_DIR = '/etc/letsencrypt';
export const DEFAULT_PLATFORM_ID = 'ubuntu';
export const DEFAULT_MIN_PLATFORM_VERSION = '16.04';
export const DEFAULT_OS_RELEASE_PATH = '/etc/os-release';
export const DEFAULT_RENEW_HOURS = [6, 18];
export const DEFAULT_UPDATE_STATUS_INTERVAL = 300_000; // 5 minutes
export const DEFAULT_THROTTLE_TTL = 60000;
export const DEFAULT_THROTTLE_LIMIT = 100;

// Ports the issuance client binds for standalone validation
export const STANDALONE_PORTS = [80, 443] as const;
