/**
 * libvirt XML Handling
 *
 * Parses domain and snapshot XML with fast-xml-parser and renders the
 * snapshot descriptor sent to `virsh snapshot-create`.
 */

import { basename, dirname, join } from 'node:path';
import { XMLParser } from 'fast-xml-parser';

import { splitExtension } from '../lib/paths.js';
import type {
  DomainState,
  SnapshotDescriptor,
  SnapshotDiskSpec,
  SnapshotKind,
  SnapshotOverlay,
} from './types.js';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (tagName: string) => tagName === 'disk',
});

type XmlNode = Record<string, unknown>;

function asNode(value: unknown): XmlNode | null {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    const node: XmlNode = {};
    for (const [key, entry] of Object.entries(value)) {
      node[key] = entry;
    }
    return node;
  }
  return null;
}

function asNodes(value: unknown): XmlNode[] {
  if (!Array.isArray(value)) {
    const single = asNode(value);
    return single ? [single] : [];
  }
  const nodes: XmlNode[] = [];
  for (const item of value) {
    const node = asNode(item);
    if (node) {
      nodes.push(node);
    }
  }
  return nodes;
}

/**
 * Text content of an element: either a bare string or `#text` when the
 * element also carries attributes.
 */
function textOf(value: unknown): string | null {
  if (typeof value === 'string') {
    return value;
  }
  const node = asNode(value);
  const inner = node?.['#text'];
  return typeof inner === 'string' ? inner : null;
}

function attr(node: XmlNode | null, name: string): string | null {
  const value = node?.[`@_${name}`];
  return typeof value === 'string' ? value : null;
}

function parseRoot(xml: string, rootName: string): XmlNode {
  const parsed: unknown = parser.parse(xml);
  const root = asNode(asNode(parsed)?.[rootName]);
  if (!root) {
    throw new Error(`Expected <${rootName}> root element`);
  }
  return root;
}

/**
 * Escape a value for use in XML text or a single-quoted attribute.
 */
export function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

const DOMSTATE_ALIASES: Record<string, DomainState> = {
  'running': 'running',
  'idle': 'blocked',
  'blocked': 'blocked',
  'paused': 'paused',
  'in shutdown': 'shutdown',
  'shutdown': 'shutdown',
  'shut off': 'shutoff',
  'shutoff': 'shutoff',
  'crashed': 'crashed',
  'pmsuspended': 'pmsuspended',
  'no state': 'nostate',
  'nostate': 'nostate',
};

/**
 * Normalize `virsh domstate` output (or a snapshot `<state>`) to a
 * DomainState. Returns null for values that are not power states.
 *
 * `disk-snapshot` is what libvirt records for a disk-only snapshot of an
 * active domain, so it maps to `running`.
 */
export function parseDomainState(raw: string): DomainState | null {
  const value = raw.trim().toLowerCase();
  if (value === 'disk-snapshot') {
    return 'running';
  }
  return DOMSTATE_ALIASES[value] ?? null;
}

/**
 * Compute the overlay path for a source image:
 * `<dir>/<stem>.<snapshot>.<suffix>`, suffix defaulting to `qcow2`.
 */
export function overlayPathFor(source: string, snapshotName: string): string {
  const [stem, extension] = splitExtension(basename(source));
  return join(dirname(source), `${stem}.${snapshotName}.${extension ?? 'qcow2'}`);
}

/**
 * Enumerate the disks of a live domain that can take an external overlay.
 *
 * Only file-backed `device='disk'` entries with both a target and a source
 * qualify; CD-ROMs, network and block devices are skipped.
 */
export function listSnapshotDisks(domainXml: string, snapshotName: string): SnapshotDiskSpec[] {
  const domain = parseRoot(domainXml, 'domain');
  const devices = asNode(domain['devices']);
  const disks: SnapshotDiskSpec[] = [];

  for (const disk of asNodes(devices?.['disk'])) {
    if (attr(disk, 'type') !== 'file' || attr(disk, 'device') !== 'disk') {
      continue;
    }
    const target = attr(asNode(disk['target']), 'dev');
    const source = attr(asNode(disk['source']), 'file');
    if (!target || !source) {
      continue;
    }
    disks.push({ target, source, overlay: overlayPathFor(source, snapshotName) });
  }

  return disks;
}

/**
 * Render the `<domainsnapshot>` document for an external disk-only snapshot.
 */
export function buildSnapshotXml(
  name: string,
  description: string,
  disks: readonly SnapshotDiskSpec[]
): string {
  const diskLines = disks.map((disk) =>
    [
      `    <disk name='${escapeXml(disk.target)}' snapshot='external'>`,
      `      <driver type='qcow2'/>`,
      `      <source file='${escapeXml(disk.overlay)}'/>`,
      `    </disk>`,
    ].join('\n')
  );

  return [
    '<domainsnapshot>',
    `  <name>${escapeXml(name)}</name>`,
    `  <description>${escapeXml(description)}</description>`,
    '  <disks>',
    ...diskLines,
    '  </disks>',
    '</domainsnapshot>',
  ].join('\n');
}

/**
 * Parse `virsh snapshot-dumpxml` output.
 *
 * @throws Error when the document is not a domainsnapshot
 */
export function parseSnapshotXml(xml: string): SnapshotDescriptor {
  const root = parseRoot(xml, 'domainsnapshot');

  const name = textOf(root['name']);
  if (!name) {
    throw new Error('Snapshot XML has no <name>');
  }

  const description = textOf(root['description']);
  const state = textOf(root['state']) ?? 'unknown';

  let createdAt: Date | null = null;
  const creationTime = textOf(root['creationTime']);
  if (creationTime && /^\d+$/.test(creationTime)) {
    createdAt = new Date(Number(creationTime) * 1000);
  }

  const memoryMode = attr(asNode(root['memory']), 'snapshot');
  const overlays: SnapshotOverlay[] = [];

  for (const disk of asNodes(asNode(root['disks'])?.['disk'])) {
    const mode = attr(disk, 'snapshot');
    const target = attr(disk, 'name');
    if (mode === 'external') {
      const path = attr(asNode(disk['source']), 'file');
      if (target && path) {
        overlays.push({ target, path });
      }
    }
  }

  // No external overlay means the state lives inside the images themselves.
  let kind: SnapshotKind = 'internal';
  if (overlays.length > 0) {
    kind = memoryMode === 'external' ? 'external-memory' : 'external-disk-only';
  }

  return {
    name,
    description: description && description.length > 0 ? description : null,
    createdAt,
    state,
    powerState: parseDomainState(state),
    overlays,
    kind,
  };
}
