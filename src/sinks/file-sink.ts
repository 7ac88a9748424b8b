/**
 * Appends every PerformanceIndicators record to a CSV file.
 *
 * Each instance opens a fresh file (`<unix-seconds>.csv`, suffixed on a
 * clash), writes the header, then writes and syncs one row per record. The
 * handle is closed in `stopped()`, which the supervisor runs on crashes too.
 */
import { mkdir, open, type FileHandle } from "node:fs/promises";
import path from "node:path";
import type { Actor, ActorContext } from "../actors/actor.js";
import { errorMessage } from "../errors.js";
import { logSink } from "../logging.js";
import type { PerformanceIndicators, PipelineTopics } from "../pipeline/types.js";
import { CSV_HEADER, formatCsvRow } from "./csv.js";

export interface FileSinkOptions {
  outputDir: string;
  now?: () => Date;
  /** Called with the path of each file the sink opens */
  onOpen?: (filePath: string) => void;
}

const MAX_NAME_ATTEMPTS = 100;

function isFileExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

/** Create `<dir>/<unix-seconds>.csv` exclusively, adding `-1`, `-2`, … until a name is free. */
export async function createUniqueFile(dir: string, now: Date): Promise<{ filePath: string; handle: FileHandle }> {
  const base = String(Math.floor(now.getTime() / 1000));
  for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
    const name = attempt === 0 ? `${base}.csv` : `${base}-${attempt}.csv`;
    const filePath = path.join(dir, name);
    try {
      const handle = await open(filePath, "wx");
      return { filePath, handle };
    } catch (err) {
      if (!isFileExists(err)) throw err;
    }
  }
  throw new Error(`Could not find a free file name for ${base}.csv in '${dir}'`);
}

export class FileSinkActor implements Actor<PerformanceIndicators, PipelineTopics> {
  private file: FileHandle | null = null;
  private filePath: string | null = null;
  private rows = 0;

  constructor(private readonly opts: FileSinkOptions) {}

  async started(ctx: ActorContext<PerformanceIndicators, PipelineTopics>): Promise<void> {
    await mkdir(this.opts.outputDir, { recursive: true });
    const { filePath, handle } = await createUniqueFile(this.opts.outputDir, this.opts.now ? this.opts.now() : new Date());
    this.file = handle;
    this.filePath = filePath;
    await handle.write(`${CSV_HEADER}\n`);
    await handle.datasync();
    this.opts.onOpen?.(filePath);
    ctx.subscribe("performance-indicators", (pi) => pi);
    logSink.info({ file: filePath }, "CSV sink opened");
  }

  async handle(pi: PerformanceIndicators): Promise<void> {
    if (!this.file) return;
    try {
      await this.file.write(`${formatCsvRow(pi)}\n`);
      await this.file.datasync();
      this.rows++;
    } catch (err) {
      logSink.error({ file: this.filePath, symbol: pi.symbol, err: errorMessage(err) }, "CSV write failed — row dropped");
    }
  }

  async stopped(): Promise<void> {
    const file = this.file;
    if (!file) return;
    this.file = null;
    try {
      await file.datasync();
    } finally {
      await file.close();
      logSink.info({ file: this.filePath, rows: this.rows }, "CSV sink closed");
    }
  }
}
