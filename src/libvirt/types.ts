/**
 * libvirt Types
 *
 * Type definitions for domain and snapshot data returned by virsh.
 */

/**
 * Domain power states as reported by `virsh domstate`, normalized to the
 * libvirt XML spelling.
 */
export type DomainState =
  | 'running'
  | 'blocked'
  | 'paused'
  | 'shutdown'
  | 'shutoff'
  | 'crashed'
  | 'pmsuspended'
  | 'nostate';

/**
 * A resolved VM handle. Valid for the duration of one call only.
 */
export interface DomainHandle {
  name: string;
  state: DomainState;
}

/**
 * How a recorded snapshot stores its state.
 */
export type SnapshotKind =
  | 'external-memory'
  | 'external-disk-only'
  | 'internal'
  | 'unknown';

/**
 * One overlay file produced by an external snapshot.
 */
export interface SnapshotOverlay {
  /** Guest-side target device, e.g. `vda` */
  target: string;
  /** Absolute path of the overlay image on the host */
  path: string;
}

/**
 * Parsed snapshot metadata.
 */
export interface SnapshotDescriptor {
  name: string;
  description: string | null;
  createdAt: Date | null;
  /** Raw `<state>` value recorded by libvirt (e.g. `disk-snapshot`) */
  state: string;
  /** Power state of the VM when the snapshot was taken */
  powerState: DomainState | null;
  overlays: SnapshotOverlay[];
  kind: SnapshotKind;
  /** Set on placeholder entries whose metadata could not be parsed */
  parseError?: string;
}

/**
 * A disk that can receive an external overlay.
 */
export interface SnapshotDiskSpec {
  target: string;
  source: string;
  overlay: string;
}

/**
 * Flags for the create primitive. Metadata is always recorded.
 */
export interface SnapshotCreateFlags {
  diskOnly: boolean;
  atomic: boolean;
}

/**
 * Power state requested after a revert.
 */
export type RevertTarget = 'running' | 'paused' | 'keep';

/**
 * Guest agent (QMP-style) command and its JSON response.
 */
export interface GuestAgentCommand {
  execute: string;
  arguments?: Record<string, unknown>;
}

export interface GuestAgentResponse {
  return?: unknown;
  error?: {
    class?: string;
    desc?: string;
  };
}

/**
 * Where `virsh domifaddr` reads guest addresses from.
 */
export type AddressSource = 'agent' | 'lease';

/**
 * One row of `virsh domifaddr`.
 */
export interface InterfaceAddress {
  interface: string;
  /** Null when virsh prints none */
  mac: string | null;
  family: 'ipv4' | 'ipv6';
  address: string;
  prefix: number | null;
}
