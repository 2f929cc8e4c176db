/**
 * Scenario import/export as JSON files.
 * Invalid input is logged and yields null rather than throwing.
 */

import { readFile, writeFile } from "node:fs/promises";
import type { SavedScenario } from "@/lib/types/zod";
import { SavedScenarioSchema } from "@/lib/types/zod";

export function parseScenarioJson(text: string): SavedScenario | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    console.error(
      "[Scenario] Malformed JSON:",
      error instanceof Error ? error.message : error
    );
    return null;
  }

  const parsed = SavedScenarioSchema.safeParse(raw);
  if (!parsed.success) {
    console.error("[Scenario] Invalid scenario data:", parsed.error);
    return null;
  }
  return parsed.data;
}

export function serializeScenario(
  scenario: SavedScenario,
  exportedAt: Date = new Date()
): string {
  const payload = {
    exportedAt: exportedAt.toISOString(),
    ...scenario,
  };
  return JSON.stringify(payload, null, 2);
}

export async function loadScenarioFile(path: string): Promise<SavedScenario | null> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    console.error(
      "[Scenario] Load error:",
      error instanceof Error ? error.message : error
    );
    return null;
  }
  return parseScenarioJson(text);
}

export async function saveScenarioFile(
  path: string,
  scenario: SavedScenario
): Promise<{ ok: boolean; error?: string }> {
  try {
    await writeFile(path, serializeScenario(scenario) + "\n", "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error("[Scenario] Save error:", message);
    return { ok: false, error: message };
  }
  return { ok: true };
}
