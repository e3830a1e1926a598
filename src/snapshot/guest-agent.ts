/**
 * Guest filesystem freeze/thaw through the QEMU guest agent.
 */

import type { Hypervisor } from '../libvirt/hypervisor.js';
import type { GuestAgentResponse } from '../libvirt/types.js';

export type AgentOutcome =
  | { ok: true; filesystems: number | null }
  | { ok: false; reason: string };

function outcomeOf(response: GuestAgentResponse): AgentOutcome {
  if (response.error) {
    const detail = response.error.desc ?? response.error.class ?? 'unknown agent error';
    return { ok: false, reason: detail };
  }
  return { ok: true, filesystems: typeof response.return === 'number' ? response.return : null };
}

async function dispatch(
  hypervisor: Hypervisor,
  domain: string,
  execute: string,
  timeoutMs: number
): Promise<AgentOutcome> {
  try {
    return outcomeOf(await hypervisor.agentCommand(domain, { execute }, timeoutMs));
  } catch (error) {
    return { ok: false, reason: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Freeze all guest filesystems. Never throws; an unreachable agent is
 * reported as `{ ok: false }`.
 */
export function freezeFilesystems(hypervisor: Hypervisor, domain: string, timeoutMs: number): Promise<AgentOutcome> {
  return dispatch(hypervisor, domain, 'guest-fsfreeze-freeze', timeoutMs);
}

export function thawFilesystems(hypervisor: Hypervisor, domain: string, timeoutMs: number): Promise<AgentOutcome> {
  return dispatch(hypervisor, domain, 'guest-fsfreeze-thaw', timeoutMs);
}
