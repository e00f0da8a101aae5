// Branded primitives shared across layers. Construction goes through the
// as*() helpers so call sites cannot mix a remote URL with a logical path.

declare const brand: unique symbol;
export type Brand<T, B extends string> = T & { readonly [brand]: B };

/** Slash-separated logical path relative to the documentation root, no extension. */
export type DocPath = Brand<string, "DocPath">;
/** Address of a document on the documentation server (absolute or host-relative). */
export type RemoteUrl = Brand<string, "RemoteUrl">;
/** Filesystem path. */
export type Path = Brand<string, "Path">;

export const asDocPath = (s: string): DocPath => s as DocPath;
export const asRemoteUrl = (s: string): RemoteUrl => s as RemoteUrl;
export const asPath = (s: string): Path => s as Path;

export interface DiscourseCfg {
  /** e.g. https://discourse.example.test */
  baseUrl: string;
  apiUsername: string;
  apiKey: string;
}

export interface GitHubCfg {
  token: string;
  /** owner/name */
  repository: string;
  /** Defaults to https://api.github.com */
  apiUrl?: string;
}
