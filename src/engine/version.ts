const ENGINE_VERSION_RE = /(?<![\d.])(\d+\.\d+(?:\.\d+)?\.[A-Za-z]\w*(?:\.[\w-]+)*)/;

/**
 * Pull the version token out of `godot --version` output, e.g.
 * "4.2.1.stable.official.b09f793f5". Returns null when there is none.
 */
export function parseEngineVersion(output: string): string | null {
  const match = output.match(ENGINE_VERSION_RE);
  return match ? match[1] : null;
}

/** Release asset names for one engine version on linux x86_64. */
export function releaseAssets(version: string): { binary: string; archive: string; templates: string } {
  const stem = `Godot_v${version}-stable`;
  return {
    binary: `${stem}_linux.x86_64`,
    archive: `${stem}_linux.x86_64.zip`,
    templates: `${stem}_export_templates.tpz`,
  };
}

export function releaseUrl(baseUrl: string, version: string, asset: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${version}-stable/${asset}`;
}
