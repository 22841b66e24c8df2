/**
 * OCI Distribution Spec client
 *
 * Native TypeScript implementation of the registry calls the graph engine
 * needs: existence checks, manifest and blob pulls, monolithic blob upload
 * and manifest push (which doubles as tagging).
 *
 * @see https://github.com/opencontainers/distribution-spec/blob/main/spec.md
 */

import { z } from "zod";
import type { HttpClient } from "#/core";
import { DEFAULT_REGISTRY_API_HOST, DEFAULT_REGISTRY_HOST, OCI_MEDIA_TYPES, USER_AGENT } from "#/constants";
import { digestOf } from "#/content/descriptor";
import type {
  OciRegistryConfig,
  HeadResult,
  ResolveResult,
  PullManifestResult,
  PullBlobResult,
  UploadResult,
  ListTagsResult,
} from "./oci.types";

export const MANIFEST_MEDIA_TYPES: readonly string[] = [
  OCI_MEDIA_TYPES.artifactManifest,
  OCI_MEDIA_TYPES.imageIndex,
  OCI_MEDIA_TYPES.imageManifest,
  OCI_MEDIA_TYPES.dockerManifestList,
  OCI_MEDIA_TYPES.dockerManifest,
];

const MANIFEST_ACCEPT = MANIFEST_MEDIA_TYPES.join(", ");

// GET /v2/<name>/tags/list
const TagsListSchema = z.object({
  name: z.string().optional(),
  tags: z.array(z.string()).nullable().optional(),
});

interface AuthChallenge {
  realm: string;
  service?: string;
  scope?: string;
}

export class OciClient {
  private host: string;
  private token?: string;
  private username?: string;
  private password?: string;
  private scheme: string;
  private userAgent: string;
  private http: HttpClient;
  private tokenCache: Map<string, string> = new Map();

  constructor(config: OciRegistryConfig, http: HttpClient) {
    this.host = config.host === DEFAULT_REGISTRY_HOST ? DEFAULT_REGISTRY_API_HOST : config.host;
    this.token = config.token;
    this.username = config.username;
    this.password = config.password;
    this.scheme = config.plainHttp ? "http" : "https";
    this.userAgent = config.userAgent ?? USER_AGENT;
    this.http = http;
  }

  /**
   * Get request headers for OCI registry API
   */
  private getHeaders(accept?: string, extra: Record<string, string> = {}): Record<string, string> {
    const headers: Record<string, string> = {
      "User-Agent": this.userAgent,
      ...extra,
    };

    if (accept) {
      headers["Accept"] = accept;
    }

    if (this.token) {
      headers["Authorization"] = `Bearer ${this.token}`;
    }

    return headers;
  }

  /**
   * Build OCI registry URL
   * @param name - Repository name (e.g., "myorg/my-catalog")
   * @param path - API path after the name
   */
  private buildUrl(name: string, path: string): string {
    return `${this.scheme}://${this.host}/v2/${name}${path}`;
  }

  /**
   * Parse WWW-Authenticate header from a 401 response
   *
   * Expected format: Bearer realm="<url>",service="<service>",scope="<scope>"
   */
  private parseWwwAuthenticate(header: string): AuthChallenge | undefined {
    if (!header.startsWith("Bearer ")) {
      return undefined;
    }

    const params = header.slice("Bearer ".length);
    const realm = params.match(/realm="([^"]+)"/)?.[1];
    const service = params.match(/service="([^"]+)"/)?.[1];
    const scope = params.match(/scope="([^"]+)"/)?.[1];

    if (!realm) {
      return undefined;
    }

    return { realm, service, scope };
  }

  /**
   * Basic credentials for the token endpoint. Registries accept any
   * username alongside a personal access token.
   */
  private basicAuth(): string | undefined {
    if (this.username && this.password) {
      return Buffer.from(`${this.username}:${this.password}`).toString("base64");
    }
    if (this.token) {
      return Buffer.from(`${this.username ?? "USERNAME"}:${this.token}`).toString("base64");
    }
    return undefined;
  }

  /**
   * Exchange credentials (or nothing, for anonymous pulls) for a
   * temporary registry Bearer token
   *
   * 1. Initial request returns 401 with WWW-Authenticate header
   * 2. Call the token endpoint, with Basic auth when we have credentials
   * 3. Use the returned token for the retried request
   */
  private async exchangeToken(wwwAuthenticate: string): Promise<string | undefined> {
    const params = this.parseWwwAuthenticate(wwwAuthenticate);
    if (!params) {
      return undefined;
    }

    const cacheKey = `${params.service ?? ""}:${params.scope ?? ""}`;
    const cached = this.tokenCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const tokenUrl = new URL(params.realm);
    if (params.service) tokenUrl.searchParams.set("service", params.service);
    if (params.scope) tokenUrl.searchParams.set("scope", params.scope);

    const basic = this.basicAuth();
    const response = await this.http.fetch(tokenUrl.toString(), {
      headers: basic ? { Authorization: `Basic ${basic}` } : {},
    });

    if (!response.ok) {
      return undefined;
    }

    const data: unknown = await response.json();
    const exchangedToken = readTokenField(data);

    if (exchangedToken) {
      this.tokenCache.set(cacheKey, exchangedToken);
    }

    return exchangedToken;
  }

  /**
   * Fetch with automatic token exchange on 401 responses
   */
  private async authenticatedFetch(url: string, options: Omit<RequestInit, "headers"> & { headers?: Record<string, string> } = {}): Promise<Response> {
    const response = await this.http.fetch(url, options);

    if (response.status !== 401) {
      return response;
    }

    const wwwAuthenticate = response.headers.get("www-authenticate");
    if (!wwwAuthenticate) {
      return response;
    }

    const exchangedToken = await this.exchangeToken(wwwAuthenticate);
    if (!exchangedToken) {
      return response;
    }

    const retryHeaders: Record<string, string> = {
      ...options.headers,
      Authorization: `Bearer ${exchangedToken}`,
    };

    return this.http.fetch(url, { ...options, headers: retryHeaders });
  }

  /**
   * Check if registry is accessible (ping /v2/)
   */
  async ping(): Promise<boolean> {
    try {
      const url = `${this.scheme}://${this.host}/v2/`;
      const response = await this.http.fetch(url, {
        headers: this.getHeaders(),
      });
      return response.ok || response.status === 401; // 401 means registry exists but needs auth
    } catch {
      return false;
    }
  }

  /**
   * HEAD /v2/<name>/manifests/<reference>
   */
  async headManifest(name: string, reference: string): Promise<HeadResult> {
    return this.head(this.buildUrl(name, `/manifests/${reference}`), MANIFEST_ACCEPT, "manifest");
  }

  /**
   * HEAD /v2/<name>/blobs/<digest>
   */
  async headBlob(name: string, digest: string): Promise<HeadResult> {
    return this.head(this.buildUrl(name, `/blobs/${digest}`), undefined, "blob");
  }

  private async head(url: string, accept: string | undefined, kind: string): Promise<HeadResult> {
    try {
      const response = await this.authenticatedFetch(url, {
        method: "HEAD",
        headers: this.getHeaders(accept),
      });
      if (response.ok) {
        return { success: true, exists: true };
      }
      if (response.status === 404) {
        return { success: true, exists: false };
      }
      return {
        success: false,
        status: response.status,
        error: `Failed to check ${kind}: ${response.status} ${response.statusText}`,
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      return { success: false, error: `Failed to check ${kind}: ${message}` };
    }
  }

  /**
   * Resolve a tag or digest to the descriptor of the manifest it names.
   * Falls back to a GET when the registry omits Docker-Content-Digest.
   */
  async resolve(name: string, reference: string): Promise<ResolveResult> {
    try {
      const url = this.buildUrl(name, `/manifests/${reference}`);
      const response = await this.authenticatedFetch(url, {
        method: "HEAD",
        headers: this.getHeaders(MANIFEST_ACCEPT),
      });

      if (!response.ok) {
        if (response.status === 404) {
          return { success: false, status: 404, error: `Manifest not found: ${name}:${reference}` };
        }
        return {
          success: false,
          status: response.status,
          error: `Failed to resolve: ${response.status} ${response.statusText}`,
        };
      }

      const digest = response.headers.get("docker-content-digest");
      const mediaType = contentType(response);
      const length = Number(response.headers.get("content-length"));
      if (digest && mediaType && Number.isInteger(length) && length > 0) {
        return { success: true, descriptor: { mediaType, digest, size: length } };
      }

      const pulled = await this.pullManifest(name, reference);
      if (!pulled.success || !pulled.data || !pulled.mediaType || !pulled.digest) {
        return { success: false, status: pulled.status, error: pulled.error ?? "Failed to resolve" };
      }
      return {
        success: true,
        descriptor: { mediaType: pulled.mediaType, digest: pulled.digest, size: pulled.data.length },
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      return { success: false, error: `Failed to resolve: ${message}` };
    }
  }

  /**
   * Pull manifest bytes for a specific tag/digest
   *
   * GET /v2/<name>/manifests/<reference>
   */
  async pullManifest(name: string, reference: string): Promise<PullManifestResult> {
    try {
      const url = this.buildUrl(name, `/manifests/${reference}`);

      const response = await this.authenticatedFetch(url, {
        headers: this.getHeaders(MANIFEST_ACCEPT),
      });

      if (!response.ok) {
        if (response.status === 404) {
          return {
            success: false,
            status: 404,
            error: `Manifest not found: ${name}:${reference}`,
          };
        }
        return {
          success: false,
          status: response.status,
          error: `Failed to pull manifest: ${response.status} ${response.statusText}`,
        };
      }

      const data = Buffer.from(await response.arrayBuffer());

      return {
        success: true,
        data,
        mediaType: contentType(response) ?? mediaTypeFromBody(data),
        digest: response.headers.get("docker-content-digest") ?? digestOf(data),
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      return {
        success: false,
        error: `Failed to pull manifest: ${message}`,
      };
    }
  }

  /**
   * Pull a blob by digest
   *
   * GET /v2/<name>/blobs/<digest>
   */
  async pullBlob(name: string, digest: string): Promise<PullBlobResult> {
    try {
      const url = this.buildUrl(name, `/blobs/${digest}`);

      const response = await this.authenticatedFetch(url, {
        headers: this.getHeaders(),
        redirect: "follow",
      });

      if (!response.ok) {
        if (response.status === 404) {
          return {
            success: false,
            status: 404,
            error: `Blob not found: ${digest}`,
          };
        }
        return {
          success: false,
          status: response.status,
          error: `Failed to pull blob: ${response.status} ${response.statusText}`,
        };
      }

      const buffer = await response.arrayBuffer();

      return {
        success: true,
        data: Buffer.from(buffer),
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      return {
        success: false,
        error: `Failed to pull blob: ${message}`,
      };
    }
  }

  /**
   * Push a manifest under a tag or digest. Pushing under a tag both
   * uploads and tags it.
   *
   * PUT /v2/<name>/manifests/<reference>
   */
  async pushManifest(name: string, reference: string, data: Buffer, mediaType: string): Promise<UploadResult> {
    try {
      const url = this.buildUrl(name, `/manifests/${reference}`);
      const response = await this.authenticatedFetch(url, {
        method: "PUT",
        headers: this.getHeaders(undefined, { "Content-Type": mediaType }),
        body: new Uint8Array(data),
      });

      if (response.status !== 201 && !response.ok) {
        return {
          success: false,
          status: response.status,
          error: `Failed to push manifest: ${response.status} ${response.statusText}`,
        };
      }

      return {
        success: true,
        digest: response.headers.get("docker-content-digest") ?? digestOf(data),
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      return { success: false, error: `Failed to push manifest: ${message}` };
    }
  }

  /**
   * Monolithic blob upload
   *
   * POST /v2/<name>/blobs/uploads/  ->  Location
   * PUT  <location>?digest=<digest>
   */
  async pushBlob(name: string, digest: string, data: Buffer): Promise<UploadResult> {
    try {
      const startUrl = this.buildUrl(name, "/blobs/uploads/");
      const started = await this.authenticatedFetch(startUrl, {
        method: "POST",
        headers: this.getHeaders(),
      });

      if (started.status !== 202) {
        return {
          success: false,
          status: started.status,
          error: `Failed to start blob upload: ${started.status} ${started.statusText}`,
        };
      }

      const location = started.headers.get("location");
      if (!location) {
        return { success: false, error: "Failed to start blob upload: registry returned no upload location" };
      }

      const uploadUrl = new URL(location, `${this.scheme}://${this.host}`);
      uploadUrl.searchParams.set("digest", digest);

      const response = await this.authenticatedFetch(uploadUrl.toString(), {
        method: "PUT",
        headers: this.getHeaders(undefined, {
          "Content-Type": "application/octet-stream",
          "Content-Length": String(data.length),
        }),
        body: new Uint8Array(data),
      });

      if (response.status !== 201) {
        return {
          success: false,
          status: response.status,
          error: `Failed to push blob: ${response.status} ${response.statusText}`,
        };
      }

      return { success: true, digest };
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      return { success: false, error: `Failed to push blob: ${message}` };
    }
  }

  /**
   * List all tags for a repository
   *
   * GET /v2/<name>/tags/list
   */
  async listTags(name: string): Promise<ListTagsResult> {
    try {
      const url = this.buildUrl(name, "/tags/list");

      const response = await this.authenticatedFetch(url, {
        headers: this.getHeaders(),
      });

      if (!response.ok) {
        if (response.status === 404) {
          // Repository doesn't exist or has no tags
          return {
            success: true,
            tags: [],
          };
        }
        return {
          success: false,
          status: response.status,
          error: `Failed to list tags: ${response.status} ${response.statusText}`,
        };
      }

      const data = TagsListSchema.safeParse(await response.json());
      if (!data.success) {
        return { success: false, error: "Failed to list tags: malformed response" };
      }

      return {
        success: true,
        tags: data.data.tags ?? [],
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : "Unknown error";
      return {
        success: false,
        error: `Failed to list tags: ${message}`,
      };
    }
  }
}

function readTokenField(data: unknown): string | undefined {
  if (typeof data !== "object" || data === null) return undefined;
  // Docker Hub answers with both; some registries only send access_token
  for (const key of ["token", "access_token"]) {
    const value: unknown = Reflect.get(data, key);
    if (typeof value === "string" && value !== "") return value;
  }
  return undefined;
}

function contentType(response: Response): string | undefined {
  const header = response.headers.get("content-type");
  if (!header) return undefined;
  const mediaType = header.split(";")[0]?.trim();
  return mediaType && MANIFEST_MEDIA_TYPES.includes(mediaType) ? mediaType : undefined;
}

function mediaTypeFromBody(data: Buffer): string | undefined {
  try {
    const parsed: unknown = JSON.parse(data.toString("utf-8"));
    if (typeof parsed !== "object" || parsed === null) return undefined;
    const mediaType: unknown = Reflect.get(parsed, "mediaType");
    return typeof mediaType === "string" ? mediaType : undefined;
  } catch {
    return undefined;
  }
}
