/**
 * Kaiterra public API (REST v1) onboarding reference
 *
 * Readings from Laser Egg and Sensedge devices are published through the
 * Kaiterra REST API. Every request must be authenticated with one of:
 *
 * - URL key: the developer key is passed as the `key` query parameter.
 *   Suitable for trusted machines such as a workstation or a server.
 * - HMAC: the request is signed with a secret key and the signature is sent
 *   in the X-Kaiterra-HMAC header. The key itself never travels over the
 *   network, and the signed timestamp limits replays.
 *
 * Keys are created from the account dashboard.
 */

import type { AuthMethod } from "../services/kaiterra-auth";

export const API_BASE_URLS = {
  global: "https://api.kaiterra.com/v1/",
  china: "https://api.kaiterra.cn/v1/",
} as const;

export const DASHBOARD_URL = "https://dashboard.kaiterra.com/";

export const API_KEY_STEPS = [
  `Sign in to ${DASHBOARD_URL} (create an account if you don't have one)`,
  "Open the account settings page",
  "Create a new developer key in the API keys section",
  "Copy the key into KAITERRA_API_KEY in your .env file",
] as const;

export const EXAMPLE_SCRIPTS = {
  apiKey: "examples/restv1-apikey.py",
  hmac: "examples/restv1-hmac.py",
  authCheck: "examples/restv1-auth.py",
} as const;

// Public test devices that always report data
export const TEST_DEVICES = {
  laserEgg: "00000000-0001-0001-0000-00007e57c0de",
  sensedge: "00000000-0031-0001-0000-00007e57c0de",
} as const;

export interface ApiOverview {
  apiBaseUrl: string;
  authMethod: AuthMethod;
  regions: typeof API_BASE_URLS;
  dashboardUrl: string;
  apiKeySteps: readonly string[];
  exampleScripts: typeof EXAMPLE_SCRIPTS;
  testDevices: typeof TEST_DEVICES;
  postmanCollectionUrl?: string;
}

export function getApiOverview(options: {
  apiBaseUrl: string;
  authMethod: AuthMethod;
  postmanCollectionUrl?: string;
}): ApiOverview {
  const overview: ApiOverview = {
    apiBaseUrl: options.apiBaseUrl,
    authMethod: options.authMethod,
    regions: API_BASE_URLS,
    dashboardUrl: DASHBOARD_URL,
    apiKeySteps: API_KEY_STEPS,
    exampleScripts: EXAMPLE_SCRIPTS,
    testDevices: TEST_DEVICES,
  };
  if (options.postmanCollectionUrl) {
    overview.postmanCollectionUrl = options.postmanCollectionUrl;
  }
  return overview;
}
