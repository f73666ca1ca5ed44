export const API_PREFIX = 'api/v1';

export const DEFAULT_DATA_FILE = 'data/gradebook.json';

export const SERVER_DEFAULTS = {
  HOST: '0.0.0.0',
  PORT: 5000,
};
