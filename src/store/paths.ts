import { join } from 'node:path';
import { mkdir } from 'node:fs/promises';

// File names are derived from ids, so escape anything outside [A-Za-z0-9._-]
function toFileName(id: string): string {
  return encodeURIComponent(id).replace(/\*/g, '%2A');
}

export function fromFileName(name: string): string {
  return decodeURIComponent(name);
}

export function getSessionsDir(root: string): string {
  return join(root, 'sessions');
}

export function getInstancesDir(root: string): string {
  return join(root, 'instances');
}

// Session paths
export function getSessionPath(root: string, sessionKey: string): string {
  return join(getSessionsDir(root), `${toFileName(sessionKey)}.json`);
}

// Instance paths
export function getInstanceDir(root: string, instanceId: string): string {
  return join(getInstancesDir(root), toFileName(instanceId));
}

export function getInstanceSummaryPath(root: string, instanceId: string): string {
  return join(getInstanceDir(root, instanceId), 'instance.json');
}

export function getInstanceHistoryPath(root: string, instanceId: string): string {
  return join(getInstanceDir(root, instanceId), 'history.jsonl');
}

export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}
