import type { PipelineSession } from "./types.js";

// Runs live only as long as the process; nothing is written to disk
const runs = new Map<string, PipelineSession>();

/** Most runs kept at once; saving past it drops the least recently updated. */
export const MAX_RUNS = 100;

export function saveRun(session: PipelineSession): void {
  runs.set(session.id, session);
  while (runs.size > MAX_RUNS) {
    const oldest = listRuns()
      .filter((r) => r.id !== session.id)
      .at(-1);
    if (!oldest) break;
    runs.delete(oldest.id);
    console.log(`[runs] Dropped run ${oldest.id} (limit ${MAX_RUNS})`);
  }
}

export function getRun(id: string): PipelineSession | null {
  return runs.get(id) ?? null;
}

export function deleteRun(id: string): boolean {
  return runs.delete(id);
}

export function listRuns(): PipelineSession[] {
  return [...runs.values()].sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
}

export function clearRuns(): void {
  runs.clear();
}
