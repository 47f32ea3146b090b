import type { ClientConfig } from '../types';

declare global {
  interface Window {
    __APP_CONFIG__?: Partial<ClientConfig>;
  }
}

export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
  logoName: 'Session Scribe',
  liveDraft: true,
  language: ''
};

// Under the Vite dev server nothing is injected, so the defaults apply.
export const readClientConfig = (): ClientConfig => ({
  ...DEFAULT_CLIENT_CONFIG,
  ...(typeof window !== 'undefined' ? window.__APP_CONFIG__ : undefined)
});
