import { AuthResult, CredentialProvider } from '../engine/image-publisher';

/** Registry credentials taken from configuration (FORGE_REGISTRY_USERNAME / FORGE_REGISTRY_TOKEN). */
export class EnvCredentialProvider implements CredentialProvider {
  constructor(private username?: string, private token?: string) {}

  async authenticate(registry: string): Promise<AuthResult> {
    if (!this.username || !this.token) {
      return { ok: false, message: `no credentials configured for ${registry}` };
    }
    return { ok: true, credential: { username: this.username, secret: this.token } };
  }
}
