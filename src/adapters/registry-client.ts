/**
 * OCI distribution API client.
 *
 * Covers the three manifest calls the publisher needs (HEAD by digest, PUT by
 * digest or tag, tag resolution) plus the registry token handshake: a 401
 * carrying a Bearer challenge is answered by fetching a scoped token with the
 * credential and retrying once.
 */

import { ImageDestination } from '../domain/image';
import { RegistryClient, RegistryCredential, RegistryError } from '../engine/image-publisher';
import { logger } from '../logger';

export type FetchFn = typeof fetch;

export interface HttpRegistryClientOptions {
  fetch?: FetchFn;
  /** Use plain HTTP, for local test registries. */
  insecure?: boolean;
  requestTimeoutMs?: number;
}

const MANIFEST_ACCEPT = [
  'application/vnd.oci.image.index.v1+json',
  'application/vnd.oci.image.manifest.v1+json',
  'application/vnd.docker.distribution.manifest.list.v2+json',
  'application/vnd.docker.distribution.manifest.v2+json',
].join(', ');

const log = logger.child({ module: 'registry-client' });

interface BearerChallenge {
  realm: string;
  service?: string;
  scope?: string;
}

/** Parse a `WWW-Authenticate: Bearer realm="...",service="...",scope="..."` header. */
export function parseBearerChallenge(header: string | null): BearerChallenge | undefined {
  if (!header || !/^bearer\s/i.test(header)) return undefined;
  const params: Record<string, string> = {};
  for (const match of header.matchAll(/(\w+)="([^"]*)"/g)) {
    params[match[1].toLowerCase()] = match[2];
  }
  if (!params.realm) return undefined;
  return { realm: params.realm, service: params.service, scope: params.scope };
}

function basicAuth(credential: RegistryCredential): string {
  return `Basic ${Buffer.from(`${credential.username}:${credential.secret}`).toString('base64')}`;
}

export class HttpRegistryClient implements RegistryClient {
  private fetchFn: FetchFn;
  /** Bearer tokens by registry and repository. */
  private tokens = new Map<string, string>();

  constructor(private options: HttpRegistryClientOptions = {}) {
    this.fetchFn = options.fetch ?? fetch;
  }

  async hasManifest(destination: ImageDestination, digest: string, credential: RegistryCredential): Promise<boolean> {
    const response = await this.request(destination, `manifests/${digest}`, credential, {
      method: 'HEAD',
      headers: { Accept: MANIFEST_ACCEPT },
    });
    if (response.status === 404) return false;
    if (!response.ok) throw this.failure('HEAD manifest', destination, response);
    return true;
  }

  async putManifest(
    destination: ImageDestination,
    reference: string,
    body: Buffer,
    mediaType: string,
    credential: RegistryCredential,
  ): Promise<string> {
    const response = await this.request(destination, `manifests/${reference}`, credential, {
      method: 'PUT',
      headers: { 'Content-Type': mediaType },
      body: new Uint8Array(body),
    });
    if (!response.ok) throw this.failure(`PUT manifest ${reference}`, destination, response);
    const digest = response.headers.get('Docker-Content-Digest') ?? '';
    log.info('Manifest pushed', { repository: destination.repository, reference, digest });
    return digest;
  }

  async resolveTag(destination: ImageDestination, credential: RegistryCredential): Promise<string | undefined> {
    const response = await this.request(destination, `manifests/${destination.tag}`, credential, {
      method: 'HEAD',
      headers: { Accept: MANIFEST_ACCEPT },
    });
    if (response.status === 404) return undefined;
    if (!response.ok) throw this.failure('HEAD tag', destination, response);
    return response.headers.get('Docker-Content-Digest') ?? undefined;
  }

  private baseUrl(destination: ImageDestination): string {
    const scheme = this.options.insecure ? 'http' : 'https';
    return `${scheme}://${destination.registry}/v2/${destination.repository}`;
  }

  private async request(
    destination: ImageDestination,
    path: string,
    credential: RegistryCredential,
    init: { method: string; headers: Record<string, string>; body?: Uint8Array },
  ): Promise<Response> {
    const url = `${this.baseUrl(destination)}/${path}`;
    const tokenKey = `${destination.registry}/${destination.repository}`;
    const send = (authorization?: string): Promise<Response> =>
      this.timedFetch(url, {
        method: init.method,
        headers: authorization ? { ...init.headers, Authorization: authorization } : init.headers,
        body: init.body,
      });

    const cached = this.tokens.get(tokenKey);
    const response = await send(cached ? `Bearer ${cached}` : undefined);
    if (response.status !== 401) return response;

    const challenge = parseBearerChallenge(response.headers.get('WWW-Authenticate'));
    if (!challenge) {
      return send(basicAuth(credential));
    }

    const token = await this.fetchToken(challenge, destination, credential);
    this.tokens.set(tokenKey, token);
    return send(`Bearer ${token}`);
  }

  private async fetchToken(
    challenge: BearerChallenge,
    destination: ImageDestination,
    credential: RegistryCredential,
  ): Promise<string> {
    const url = new URL(challenge.realm);
    if (challenge.service) url.searchParams.set('service', challenge.service);
    url.searchParams.set('scope', challenge.scope ?? `repository:${destination.repository}:pull,push`);

    const response = await this.timedFetch(url.toString(), {
      method: 'GET',
      headers: { Authorization: basicAuth(credential) },
    });
    if (!response.ok) {
      throw new RegistryError(`Token request to ${url.host} failed with HTTP ${response.status}`, response.status);
    }

    const body: unknown = await response.json();
    if (typeof body === 'object' && body !== null) {
      const token = 'token' in body ? body.token : 'access_token' in body ? body.access_token : undefined;
      if (typeof token === 'string' && token.length > 0) return token;
    }
    throw new RegistryError(`Token response from ${url.host} carried no token`, 401);
  }

  private async timedFetch(
    url: string,
    init: { method: string; headers: Record<string, string>; body?: Uint8Array },
  ): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.requestTimeoutMs ?? 30_000);
    try {
      return await this.fetchFn(url, { ...init, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
    }
  }

  private failure(operation: string, destination: ImageDestination, response: Response): RegistryError {
    return new RegistryError(
      `${operation} on ${destination.registry}/${destination.repository} failed with HTTP ${response.status}`,
      response.status,
    );
  }
}
