import { DefaultAzureCredential, type TokenCredential } from "@azure/identity";
import type { Provider } from "@nestjs/common";

export const ACCESS_TOKEN_PROVIDER = Symbol("FOUNDRY_ACCESS_TOKEN_PROVIDER");

export interface AccessTokenProvider {
  /** Resolves a bearer token for the requested audience scope. */
  getToken(scope: string): Promise<string>;
}

/**
 * Wraps an `@azure/identity` credential. Token caching and refresh stay with
 * the identity library.
 */
export class AzureIdentityTokenProvider implements AccessTokenProvider {
  constructor(private readonly credential: TokenCredential) {}

  async getToken(scope: string): Promise<string> {
    const token = await this.credential.getToken(scope);
    if (!token) {
      throw new Error(`No access token was issued for scope ${scope}`);
    }
    return token.token;
  }
}

export const accessTokenProvider: Provider = {
  provide: ACCESS_TOKEN_PROVIDER,
  useFactory: (): AccessTokenProvider =>
    new AzureIdentityTokenProvider(new DefaultAzureCredential()),
};
