import { ControlPlaneClient, ControlPlaneResponse, parseJsonBody } from './control-plane-client';
import { log } from './debug';

export const WHOAMI_TIMEOUT_MS = 10_000;
export const ALTERNATIVE_ENDPOINT_TIMEOUT_MS = 5_000;

export const ALTERNATIVE_ENDPOINTS: readonly string[] = [
  '/me',
  '/user',
  '/account',
  '/auth/verify',
  '/auth/validate',
  '/api/whoami',
  '/api/me',
  '/videos/get_upload_url',
];

export interface TestedEndpoint {
  endpoint: string;
  statusCode: number;
  exists: boolean;
  authenticated: boolean;
}

export interface AuthCheckResult {
  success: boolean;
  statusCode?: number;
  endpoint?: string;
  data?: unknown;
  note?: string;
  error?: string;
  response?: string;
  testedEndpoints?: TestedEndpoint[];
}

function responseData(response: ControlPlaneResponse): unknown {
  return parseJsonBody(response.body) ?? {};
}

/**
 * Verifies an API key against the control plane. /whoami is preferred; when
 * it does not exist a list of known endpoints is probed instead.
 */
export class AuthChecker {
  constructor(private client: ControlPlaneClient) {}

  async checkWhoami(): Promise<AuthCheckResult> {
    let response: ControlPlaneResponse;
    try {
      response = await this.client.get('/whoami', WHOAMI_TIMEOUT_MS);
    } catch (error) {
      return { success: false, error: error instanceof Error ? error.message : String(error) };
    }

    if (response.status === 404) {
      return this.checkAlternativeEndpoints();
    }

    if (!response.ok) {
      return {
        success: false,
        statusCode: response.status,
        error: `HTTP ${response.status}`,
        response: response.body,
      };
    }

    return { success: true, statusCode: response.status, data: responseData(response) };
  }

  async checkAlternativeEndpoints(): Promise<AuthCheckResult> {
    const testedEndpoints: TestedEndpoint[] = [];

    for (const endpoint of ALTERNATIVE_ENDPOINTS) {
      let response: ControlPlaneResponse;
      try {
        response = await this.client.get(endpoint, ALTERNATIVE_ENDPOINT_TIMEOUT_MS);
      } catch (error) {
        log(`Skipping ${endpoint}: ${error instanceof Error ? error.message : String(error)}`);
        continue;
      }

      if ([200, 201, 204].includes(response.status)) {
        return {
          success: true,
          endpoint,
          statusCode: response.status,
          data: responseData(response),
          note: `Successfully authenticated via ${endpoint}`,
        };
      }

      if (response.status === 401 || response.status === 403) {
        testedEndpoints.push({
          endpoint,
          statusCode: response.status,
          exists: true,
          authenticated: false,
        });
      }
    }

    return {
      success: false,
      statusCode: 404,
      note: 'Could not find /whoami endpoint, but tested other endpoints',
      testedEndpoints,
    };
  }
}
