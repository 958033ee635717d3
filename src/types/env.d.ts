declare namespace NodeJS {
    interface ProcessEnv {
        WALLEX_BASE_URL?: string;
        WALLEX_API_VERSION?: string;
        WALLEX_API_KEY?: string;
        WALLEX_TIMEOUT_MS?: string;
        DEBUG?: string;
    }
}
