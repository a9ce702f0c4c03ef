/**
 * Shared helpers for tests: temporary directories, read files and running
 * Effect programs against the Node platform layer
 */

import { NodeContext } from "@effect/platform-node";
import { chmodSync, copyFileSync, mkdtempSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";
import { Effect, Logger, LogLevel } from "effect";

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), "flash-batch-"));
}

/**
 * Build FASTQ text with `count` records named `@read1/<mate>` … `@read<count>/<mate>`
 */
export function fastqRecords(count: number, mate: 1 | 2): string {
  let text = "";
  for (let i = 1; i <= count; i++) {
    text += `@read${i}/${mate}\nACGTACGTAC\n+\nIIIIIIIIII\n`;
  }
  return text;
}

/**
 * Write `<name>_R1.fastq` and `<name>_R2.fastq` into `dir`
 */
export function writeReads(
  dir: string,
  name: string,
  count: number
): { read1: string; read2: string } {
  const read1 = join(dir, `${name}_R1.fastq`);
  const read2 = join(dir, `${name}_R2.fastq`);
  writeFileSync(read1, fastqRecords(count, 1));
  writeFileSync(read2, fastqRecords(count, 2));
  return { read1, read2 };
}

/**
 * Copy the fake FLASH script into `dir` and make it executable
 */
export function installFakeFlash(dir: string): string {
  const target = join(dir, "fake-flash.sh");
  copyFileSync(fileURLToPath(new URL("../fixtures/fake-flash.sh", import.meta.url)), target);
  chmodSync(target, 0o755);
  return target;
}

/**
 * Run an Effect with the Node platform and logging silenced
 */
export function runWithPlatform<A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<A> {
  return Effect.runPromise(
    effect.pipe(Logger.withMinimumLogLevel(LogLevel.None), Effect.provide(NodeContext.layer))
  );
}

/**
 * Run an Effect that is expected to fail and return its error
 */
export function failWithPlatform<A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext>
): Promise<E> {
  return runWithPlatform(Effect.flip(effect));
}
