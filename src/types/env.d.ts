declare namespace NodeJS {
  interface ProcessEnv {
    NODE_ENV?: string
    DEV_LOG?: string
    TEST?: string
    COHERENCE_CONFIG_PATH?: string
    COHERENCE_STORE_PATH?: string
    COHERENCE_WATCH_CONFIG?: string
  }
}
