/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_SIMULATION_INTERVAL_MS?: string;
  readonly VITE_COLOR_SCHEME?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
