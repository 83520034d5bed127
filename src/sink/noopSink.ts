import { BaseSink } from "./baseSink";

export class NoopSink extends BaseSink {
  constructor() {
    super();
  }

  protected async deliver(): Promise<void> {}
}
