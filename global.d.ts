namespace NodeJS {
  interface ProcessEnv {
    NODE_ENV?: string;
    LOG_LEVEL?: string;
    DISABLE_LOGGING?: string;
    GUILDED_TOKEN?: string;
    GUILDED_MODE?: string;
    GUILDED_MAX_MESSAGES?: string;
    GUILDED_GATEWAY_URL?: string;
    GUILDED_REST_URL?: string;
  }
}
