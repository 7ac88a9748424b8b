/**
 * Pipeline assembly.
 *
 *   scheduler → fetch-request → downloaders (queue group)
 *             → quote-series → processor
 *             → performance-indicators → file sink, buffer sink
 *
 * Subscribers start before producers, so nothing the scheduler emits is
 * published into an empty topic. Stop runs in the opposite direction and
 * drains each stage before the next one is stopped.
 */
import type { ActorRef } from "../actors/actor.js";
import { Supervisor, type SupervisorOptions, type WorkerStatus } from "../actors/supervisor.js";
import { Broker } from "../bus/broker.js";
import { errorMessage } from "../errors.js";
import { logger } from "../logging.js";
import type { QuoteProvider } from "../providers/types.js";
import { BufferSinkActor, type BufferSinkMessage } from "../sinks/buffer-sink.js";
import { FileSinkActor } from "../sinks/file-sink.js";
import { DownloaderActor } from "./downloader.js";
import { ProcessorActor } from "./processor.js";
import { SchedulerActor } from "./scheduler.js";
import type { PipelineTopics } from "./types.js";

const log = logger.child({ subsystem: "pipeline" });

export interface PipelineConfig {
  symbols: readonly string[];
  from: Date;
  intervalMs: number;
  fetchOnStart: boolean;
  downloadWorkers: number;
  providerTimeoutMs: number;
  smaWindow: number;
  bufferCapacity: number;
  outputDir: string;
  supervisor: SupervisorOptions;
}

export interface PipelineDeps {
  provider: QuoteProvider;
  /** Clock for request windows and file names */
  now?: () => Date;
  /** Pass an existing bus (tests); one is created otherwise */
  bus?: Broker<PipelineTopics>;
}

/** What the pipeline needs from a supervised worker, whatever its message type. */
interface Supervised {
  readonly name: string;
  status(): WorkerStatus;
  idle(): Promise<void>;
  stop(): Promise<void>;
}

export interface Pipeline {
  readonly bus: Broker<PipelineTopics>;
  readonly buffer: ActorRef<BufferSinkMessage>;
  /** Path of the CSV file currently being written */
  outputFile(): string | null;
  status(): WorkerStatus[];
  /** Resolves when every worker's mailbox is empty (tests, shutdown) */
  settle(): Promise<void>;
  stop(): Promise<void>;
}

export async function createPipeline(cfg: PipelineConfig, deps: PipelineDeps): Promise<Pipeline> {
  const bus = deps.bus ?? new Broker<PipelineTopics>();
  const now = deps.now;
  const started: Supervised[] = [];
  let outputFile: string | null = null;

  try {
    // Sinks first: a sink that cannot write aborts startup
    const fileSink = await Supervisor.start(
      "file-sink",
      () => new FileSinkActor({ outputDir: cfg.outputDir, now, onOpen: (p) => { outputFile = p; } }),
      bus,
      cfg.supervisor,
    );
    started.push(fileSink);

    const bufferSink = await Supervisor.start("buffer-sink", () => new BufferSinkActor(cfg.bufferCapacity), bus, cfg.supervisor);
    started.push(bufferSink);

    started.push(await Supervisor.start("processor", () => new ProcessorActor(cfg.smaWindow), bus, cfg.supervisor));

    for (let i = 0; i < cfg.downloadWorkers; i++) {
      started.push(
        await Supervisor.start(
          `downloader-${i + 1}`,
          () => new DownloaderActor(deps.provider, { timeoutMs: cfg.providerTimeoutMs }),
          bus,
          cfg.supervisor,
        ),
      );
    }

    // Scheduler last, once everything it feeds is subscribed
    started.push(
      await Supervisor.start(
        "scheduler",
        () =>
          new SchedulerActor({
            symbols: cfg.symbols,
            from: cfg.from,
            intervalMs: cfg.intervalMs,
            fetchOnStart: cfg.fetchOnStart,
            now,
          }),
        bus,
        cfg.supervisor,
      ),
    );

    log.info(
      { workers: started.map((w) => w.name), symbols: cfg.symbols, provider: deps.provider.name },
      "Pipeline started",
    );

    return {
      bus,
      buffer: bufferSink.ref,
      outputFile: () => outputFile,
      status: () => started.map((w) => w.status()),
      settle: async () => {
        // Upstream first, so work handed downstream is waited for too
        for (const w of [...started].reverse()) await w.idle();
      },
      stop: () => stopAll(started, bus),
    };
  } catch (err) {
    log.error({ err: errorMessage(err) }, "Pipeline startup failed — stopping started workers");
    await stopAll(started, bus);
    throw err;
  }
}

async function stopAll(workers: Supervised[], bus: Broker<PipelineTopics>): Promise<void> {
  for (const w of [...workers].reverse()) {
    try {
      await w.stop();
    } catch (err) {
      log.error({ worker: w.name, err: errorMessage(err) }, "Worker stop failed");
    }
  }
  bus.close();
  log.info("Pipeline stopped");
}
