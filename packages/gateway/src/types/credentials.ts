/**
 * Provider credentials. Owned by the caller; clients keep a frozen copy.
 */
export interface ProviderCredentials {
  readonly apiKey: string;
  readonly secret?: string;
  readonly baseUrl?: string;
  readonly region?: string;
  readonly apiVersion?: string;
}
