/**
 * Build the archive download URL for a package version.
 *
 * @param dl - Download base from the registry config document.
 * @param name - Package name.
 * @param version - Package version.
 * @returns `<dl>/<name>/<version>/download` with each segment URL-encoded.
 */
export function downloadUrl(dl: string, name: string, version: string): string {
  const base = dl.replace(/\/+$/, "");
  return `${base}/${encodeURIComponent(name)}/${encodeURIComponent(version)}/download`;
}
