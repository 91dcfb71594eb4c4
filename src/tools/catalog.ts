/**
 * @fileoverview Downloadable tool catalog
 *
 * Single-binary tools installed outside apt. URL templates take `{version}`
 * (without the leading `v`) and `{arch}` (Go-style: amd64, arm64).
 */

export interface ToolDefinition {
  name: string;
  description: string;
  binaryUrl: string;
  checksumUrl: string;
}

export const TOOL_CATALOG: Readonly<Record<string, ToolDefinition>> = {
  kubectl: {
    name: 'kubectl',
    description: 'Kubernetes command-line client',
    binaryUrl: 'https://dl.k8s.io/release/v{version}/bin/linux/{arch}/kubectl',
    checksumUrl: 'https://dl.k8s.io/release/v{version}/bin/linux/{arch}/kubectl.sha256',
  },
  talosctl: {
    name: 'talosctl',
    description: 'Talos Linux cluster management CLI',
    binaryUrl: 'https://github.com/siderolabs/talos/releases/download/v{version}/talosctl-linux-{arch}',
    checksumUrl: 'https://github.com/siderolabs/talos/releases/download/v{version}/sha256sum.txt',
  },
  sops: {
    name: 'sops',
    description: 'Encrypted secrets editor',
    binaryUrl: 'https://github.com/getsops/sops/releases/download/v{version}/sops-v{version}.linux.{arch}',
    checksumUrl: 'https://github.com/getsops/sops/releases/download/v{version}/sops-v{version}.checksums.txt',
  },
};

export function getTool(name: string): ToolDefinition | null {
  return Object.hasOwn(TOOL_CATALOG, name) ? TOOL_CATALOG[name] : null;
}

export function listTools(): ToolDefinition[] {
  return Object.values(TOOL_CATALOG);
}

export function expandTemplate(template: string, values: { version: string; arch: string }): string {
  return template.replaceAll('{version}', values.version).replaceAll('{arch}', values.arch);
}
