/**
 * Remote root taken from a URL path, without the trailing slash ('' for `/`).
 */
export function remoteRoot(url: URL): string {
  return decodeURIComponent(url.pathname).replace(/\/+$/, '');
}

export function joinRemote(root: string, relativePath: string): string {
  return `${root}/${relativePath.replace(/^\/+/, '')}`;
}
