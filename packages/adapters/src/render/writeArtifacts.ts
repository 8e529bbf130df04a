import { mkdir, writeFile } from "fs/promises";
import { join } from "path";

import type { Composition, IRenderTarget } from "@equatone/contracts";

export interface ArtifactOptions {
  outDir: string;
  /** File name without extension */
  baseName: string;
}

export class RenderError extends Error {
  constructor(
    public readonly targetId: string,
    public readonly reason: string
  ) {
    super(`Render target "${targetId}" failed: ${reason}`);
    this.name = "RenderError";
  }
}

/**
 * Render with every target and write `<outDir>/<baseName>.<extension>`.
 * Returns the written paths in target order.
 */
export async function writeArtifacts(
  composition: Composition,
  targets: readonly IRenderTarget[],
  options: ArtifactOptions
): Promise<string[]> {
  await mkdir(options.outDir, { recursive: true });

  const written: string[] = [];
  for (const target of targets) {
    const path = join(options.outDir, `${options.baseName}.${target.extension}`);
    try {
      await writeFile(path, target.render(composition));
    } catch (err) {
      throw new RenderError(target.id, err instanceof Error ? err.message : String(err));
    }
    console.log(`[render] Wrote ${target.id} to ${path}`);
    written.push(path);
  }
  return written;
}
