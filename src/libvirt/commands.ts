/**
 * virsh Command Builders
 *
 * Builds argument vectors for virsh subcommands. Arguments are passed to
 * the process directly, never through a shell, so no escaping is needed
 * beyond what the XML builders do.
 */

import type { AddressSource, GuestAgentCommand, RevertTarget, SnapshotCreateFlags } from './types.js';

/**
 * `virsh domstate <domain>` → single state line, e.g. `running`, `shut off`.
 */
export function buildDomStateArgs(domain: string): string[] {
  return ['domstate', domain];
}

/**
 * `virsh dumpxml <domain>` → live domain XML.
 */
export function buildDumpXmlArgs(domain: string): string[] {
  return ['dumpxml', domain];
}

/**
 * `virsh domifaddr <domain> --source agent|lease` → address table.
 */
export function buildDomIfAddrArgs(domain: string, source: AddressSource): string[] {
  return ['domifaddr', domain, '--source', source];
}

/**
 * `virsh snapshot-create <domain> --xmlfile <file> [--disk-only] [--atomic]`
 */
export function buildSnapshotCreateArgs(
  domain: string,
  xmlFile: string,
  flags: SnapshotCreateFlags
): string[] {
  const args = ['snapshot-create', domain, '--xmlfile', xmlFile];
  if (flags.diskOnly) {
    args.push('--disk-only');
  }
  if (flags.atomic) {
    args.push('--atomic');
  }
  return args;
}

/**
 * `virsh snapshot-list <domain> --name` → one name per line.
 */
export function buildSnapshotListArgs(domain: string): string[] {
  return ['snapshot-list', domain, '--name'];
}

/**
 * `virsh snapshot-dumpxml <domain> <snapshot>`
 */
export function buildSnapshotDumpXmlArgs(domain: string, snapshot: string): string[] {
  return ['snapshot-dumpxml', domain, snapshot];
}

/**
 * `virsh snapshot-revert <domain> <snapshot> [--running|--paused] --force`
 */
export function buildSnapshotRevertArgs(
  domain: string,
  snapshot: string,
  target: RevertTarget
): string[] {
  const args = ['snapshot-revert', domain, snapshot];
  if (target === 'running') {
    args.push('--running');
  } else if (target === 'paused') {
    args.push('--paused');
  }
  args.push('--force');
  return args;
}

/**
 * `virsh snapshot-delete <domain> <snapshot> [--metadata]`
 */
export function buildSnapshotDeleteArgs(
  domain: string,
  snapshot: string,
  metadataOnly: boolean
): string[] {
  const args = ['snapshot-delete', domain, snapshot];
  if (metadataOnly) {
    args.push('--metadata');
  }
  return args;
}

/**
 * `virsh qemu-agent-command <domain> '<json>' --timeout <seconds>`
 */
export function buildAgentCommandArgs(
  domain: string,
  command: GuestAgentCommand,
  timeoutSeconds: number
): string[] {
  return [
    'qemu-agent-command',
    domain,
    JSON.stringify(command),
    '--timeout',
    String(Math.max(1, Math.round(timeoutSeconds))),
  ];
}
