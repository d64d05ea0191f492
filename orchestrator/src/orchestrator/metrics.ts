import { Counter, Gauge, Histogram, Registry } from "prom-client";

export const registry = new Registry();
registry.setDefaultLabels({ service: "mention-pulse-orchestrator" });

export const mentionsIngestedTotal = new Counter({
  name: "orchestrator_mentions_ingested_total",
  help: "Mentions admitted by the ingestor",
  registers: [registry],
});

export const malformedRecordsTotal = new Counter({
  name: "orchestrator_malformed_records_total",
  help: "Source records skipped as malformed",
  registers: [registry],
});

export const duplicateMentionsTotal = new Counter({
  name: "orchestrator_duplicate_mentions_total",
  help: "Mentions dropped as duplicates",
  registers: [registry],
});

export const classificationsTotal = new Counter({
  name: "orchestrator_classifications_total",
  help: "Mentions classified, by final polarity",
  labelNames: ["polarity"] as const,
  registers: [registry],
});

export const classifierRetriesTotal = new Counter({
  name: "orchestrator_classifier_retries_total",
  help: "Classifier calls retried after the model was unavailable",
  registers: [registry],
});

export const unclassifiedMentionsTotal = new Counter({
  name: "orchestrator_unclassified_mentions_total",
  help: "Mentions left unclassified, by reason",
  labelNames: ["reason"] as const,
  registers: [registry],
});

export const queueRejectionsTotal = new Counter({
  name: "orchestrator_queue_rejections_total",
  help: "Mentions rejected because the queue was full",
  registers: [registry],
});

export const runsTotal = new Counter({
  name: "orchestrator_runs_total",
  help: "Report runs by final status",
  labelNames: ["status"] as const,
  registers: [registry],
});

export const runDurationSeconds = new Histogram({
  name: "orchestrator_run_duration_seconds",
  help: "Wall time of a report run",
  buckets: [0.5, 1, 2, 5, 10, 30, 60, 120, 300],
  registers: [registry],
});

export const queueDepth = new Gauge({
  name: "orchestrator_queue_depth",
  help: "Mentions waiting for a classifier worker",
  registers: [registry],
});
