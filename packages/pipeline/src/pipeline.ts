/**
 * Pipeline wiring: upstream clients, sources, rate gates, sink, signal cache,
 * fusion engine and the scheduled jobs.
 */

import type { RiskScore } from "@roadrisk/types";
import {
  NhtsaSafetySource,
  RateGateRegistry,
  SqliteRecordSink,
  TomTomFlowSource,
  TomTomIncidentSource,
  UpstreamClient,
  VinDecoder,
  errorMessage,
  type HttpTransport,
  type RecordKind,
  type RecordSink,
} from "@roadrisk/ingestion";
import { RiskFusionEngine, loadFusionPolicy, type FusionPolicy } from "@roadrisk/risk";
import { ConfigError, loadRegions, type PipelineConfig, type Region } from "./config.js";
import { FullPipelineJob } from "./jobs/full-pipeline.js";
import { ModelRefreshJob } from "./jobs/model-refresh.js";
import { TrafficSweepJob } from "./jobs/traffic-sweep.js";
import { VehicleSweepJob, VinBacklog } from "./jobs/vehicle-sweep.js";
import { scoreSubject } from "./risk-scoring.js";
import type { DisabledJob, Job } from "./scheduler/job.js";
import { JobScheduler, type JobStatus } from "./scheduler/scheduler.js";
import { SignalCache } from "./signal-cache.js";
import {
  JsonSubjectDirectory,
  StaticSubjectDirectory,
  type Subject,
  type SubjectDirectory,
} from "./subjects.js";

/** Collaborators that replace the configured defaults (tests, embedding) */
export interface PipelineOverrides {
  transport?: HttpTransport;
  sink?: RecordSink;
  directory?: SubjectDirectory;
  regions?: readonly Region[];
  now?: () => Date;
}

type TrafficSettings =
  | { enabled: true; apiKey: string; regions: readonly Region[] }
  | { enabled: false; reason: string };

const RECORD_KINDS: readonly RecordKind[] = ["traffic", "incident", "vehicle", "risk"];

function fusionPolicy(config: PipelineConfig): FusionPolicy {
  try {
    return loadFusionPolicy(config.fusionPolicyFile);
  } catch (err) {
    throw new ConfigError(
      `Invalid fusion policy ${config.fusionPolicyFile ?? ""}: ${errorMessage(err)}`,
      "FUSION_POLICY_FILE",
    );
  }
}

export class Pipeline {
  readonly cache = new SignalCache();
  readonly engine: RiskFusionEngine;
  readonly sink: RecordSink;
  readonly scheduler: JobScheduler;
  readonly backlog: VinBacklog;
  private readonly now: () => Date;

  constructor(config: PipelineConfig, overrides: PipelineOverrides = {}) {
    this.now = overrides.now ?? (() => new Date());
    this.engine = new RiskFusionEngine(fusionPolicy(config));
    this.sink = overrides.sink ?? new SqliteRecordSink(config.sinkPath);
    this.backlog = new VinBacklog(config.vehicles.vins);

    const { transport, now } = overrides;
    const gates = new RateGateRegistry();
    const directory =
      overrides.directory ??
      (config.subjectsFile
        ? new JsonSubjectDirectory(config.subjectsFile)
        : new StaticSubjectDirectory());

    const jobs: Job[] = [];
    const disabled: DisabledJob[] = [];

    // vPIC and the ratings API are both NHTSA: one gate spaces every request
    const nhtsaGate = gates.gate("nhtsa", config.poll.minSpacingMs);
    const vehicleSweep = new VehicleSweepJob({
      intervalMs: config.intervals.vehicleSweepMs,
      backlog: this.backlog,
      batchLimit: config.vehicles.batchLimit,
      decoder: new VinDecoder(
        new UpstreamClient("nhtsa", { baseUrl: config.nhtsa.vpicUrl, gate: nhtsaGate, transport }),
      ),
      source: new NhtsaSafetySource({
        client: new UpstreamClient("nhtsa", {
          baseUrl: config.nhtsa.ratingsUrl,
          gate: nhtsaGate,
          transport,
        }),
        now,
      }),
      poll: config.poll,
      sink: this.sink,
      cache: this.cache,
    });
    const modelRefresh = new ModelRefreshJob({
      intervalMs: config.intervals.modelRefreshMs,
      directory,
      engine: this.engine,
      cache: this.cache,
      sink: this.sink,
      now,
    });

    const traffic = this.trafficSettings(config, overrides.regions);
    if (traffic.enabled) {
      const client = new UpstreamClient("traffic", {
        baseUrl: config.tomtom.baseUrl,
        apiKey: traffic.apiKey,
        gate: gates.gate("tomtom", config.poll.minSpacingMs),
        transport,
      });
      const trafficSweep = new TrafficSweepJob({
        intervalMs: config.intervals.trafficSweepMs,
        flow: new TomTomFlowSource({ client, now }),
        incidents: new TomTomIncidentSource({ client, now }),
        regions: traffic.regions,
        grid: config.grid,
        poll: config.poll,
        sink: this.sink,
        cache: this.cache,
      });
      jobs.push(
        trafficSweep,
        vehicleSweep,
        modelRefresh,
        new FullPipelineJob(config.intervals.fullPipelineMs, [trafficSweep, modelRefresh]),
      );
    } else {
      jobs.push(vehicleSweep, modelRefresh);
      const { reason } = traffic;
      disabled.push({ name: "traffic-sweep", reason }, { name: "full-pipeline", reason });
    }

    this.scheduler = new JobScheduler(jobs, { disabled, now: this.now });
  }

  start(): void {
    console.log(`[pipeline] Starting — records go to ${this.sink.name}`);
    this.scheduler.start();
  }

  /** Stop the scheduler (flushing partial sweeps), then close the sink */
  async stop(): Promise<void> {
    await this.scheduler.stop();
    const counts = await Promise.all(
      RECORD_KINDS.map(async (kind) => `${await this.sink.count(kind)} ${kind}`),
    );
    console.log(`[pipeline] Stored records: ${counts.join(", ")}`);
    await this.sink.close();
  }

  /**
   * The traffic jobs need a TomTom key and the sweep regions. Either one
   * missing disables those jobs only.
   */
  private trafficSettings(
    config: PipelineConfig,
    regions: readonly Region[] | undefined,
  ): TrafficSettings {
    const { apiKey } = config.tomtom;
    if (!apiKey) return { enabled: false, reason: "TOMTOM_API_KEY is not set" };
    if (regions) return { enabled: true, apiKey, regions };
    try {
      return { enabled: true, apiKey, regions: loadRegions(config.regionsFile) };
    } catch (err) {
      if (!(err instanceof ConfigError)) throw err;
      console.error(`[config] ${err.message}`);
      return { enabled: false, reason: err.message };
    }
  }

  status(): JobStatus[] {
    return this.scheduler.status();
  }

  /** On-demand fusion against the latest cached signals */
  score(subject: Subject): RiskScore {
    return scoreSubject(this.engine, this.cache, subject, this.now());
  }
}
