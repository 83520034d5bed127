import fs from "node:fs";
import path from "node:path";
import type { AppConfig } from "../config";
import { BaseSink } from "./baseSink";
import type { SinkStage, TaskEventEnvelope } from "./types";

const MANIFEST_FILES: Record<SinkStage, string> = {
  download: "downloads.jsonl",
  extract: "extractions.jsonl",
};

/** Appends one manifest line per outcome under the manifests directory, tagged with the run. */
export class LocalJsonlSink extends BaseSink {
  private readonly manifestsDir: string;
  private readonly runId: string;

  constructor(config: AppConfig, runId: string, clock?: () => Date) {
    super(clock);
    this.manifestsDir = path.resolve(config.outputDirs.manifests);
    this.runId = runId;
  }

  manifestPath(stage: SinkStage): string {
    return path.join(this.manifestsDir, MANIFEST_FILES[stage]);
  }

  protected async deliver(stage: SinkStage, envelopes: TaskEventEnvelope[]): Promise<void> {
    const lines = envelopes.map((envelope) => JSON.stringify({ runId: this.runId, ...envelope })).join("\n");
    await fs.promises.mkdir(this.manifestsDir, { recursive: true });
    await fs.promises.appendFile(this.manifestPath(stage), `${lines}\n`, "utf-8");
  }
}
