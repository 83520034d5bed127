import type { AppConfig } from "../config";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { NoopSink } from "./noopSink";
import { RabbitSink } from "./rabbitSink";
import { SqsSink } from "./sqsSink";
import type { Sink } from "./types";

export function createSink(config: AppConfig, runId: string): Sink {
  const { sink } = config;

  switch (sink.type) {
    case "local_jsonl":
      return new LocalJsonlSink(config, runId);
    case "sqs":
      return new SqsSink({ queueUrl: sink.sqsQueueUrl });
    case "rabbit":
      return new RabbitSink({ connectionUrl: sink.rabbitUrl });
    case "http":
      return new HttpSink({ endpoint: sink.httpEndpoint, token: sink.httpToken });
    case "none":
      return new NoopSink();
  }
}

export { HttpSink, LocalJsonlSink, NoopSink, RabbitSink, SqsSink };
export * from "./types";
