/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_RECOMMENDATION_API_URL?: string;
  readonly VITE_RECOMMENDATION_TIMEOUT_MS?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
