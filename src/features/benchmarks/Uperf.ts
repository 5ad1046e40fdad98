import { Benchmark, type BenchmarkDeps, type BenchmarkRunResult } from "../../domain/benchmark/Benchmark";
import type { MetricDocument, MetricValue } from "../../domain/collectors/Collector";
import { registerTool } from "../../registry";

/** [timestamp_ms, nr_bytes, nr_ops] as printed by `uperf -v`. */
export type UperfResultRow = [string, string, string];

export interface UperfProfileConfig {
  test_type: string;
  protocol: string;
  /** Write message size; kept under this name for existing dashboards. */
  message_size: number;
  read_message_size: number;
  num_threads: number;
  duration: number;
}

export interface UperfParsedSample {
  results: UperfResultRow[];
  config: UperfProfileConfig;
}

export class UperfParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UperfParseError";
  }
}

const PROFILE_LINE = /running profile:(.*) \.\.\./;
const TXN_LINE = /timestamp_ms:(.*) name:Txn2 nr_bytes:(.*) nr_ops:(.*)/g;

// Arguments that steer the run rather than describe it.
const RUN_ONLY_ARGS = new Set(["workload", "sample"]);

function toInt(value: string, field: string, profile: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new UperfParseError(`Profile "${profile}" has a non-numeric ${field}: "${value}".`);
  }
  return parsed;
}

/** Network throughput and latency via uperf (http://uperf.org/). */
@registerTool
export class Uperf extends Benchmark {
  static readonly toolName = "uperf";

  constructor(deps: BenchmarkDeps) {
    super(deps);
    this.argGroup
      .addArgument(["-w", "--workload"], {
        dest: "workload",
        envVar: "WORKLOAD",
        help: "Provide XML workload location",
      })
      .addArgument(["-s", "--sample"], {
        dest: "sample",
        envVar: "SAMPLE",
        defaultValue: 1,
        type: "int",
        help: "Number of times to run the benchmark",
      })
      .addArgument(["--resourcetype"], {
        dest: "resourcetype",
        envVar: "RESOURCETYPE",
        help: "Provide the resource type for uperf run - pod/vm/baremetal",
      })
      .addArgument(["--ips"], { dest: "ips", envVar: "ips", defaultValue: "" })
      .addArgument(["-h", "--remoteip"], { dest: "remoteip", envVar: "h", defaultValue: "" })
      .addArgument(["--hostnet"], { dest: "hostnetwork", envVar: "hostnet", defaultValue: "False" })
      .addArgument(["--serviceip"], { dest: "serviceip", envVar: "serviceip", defaultValue: "False" })
      .addArgument(["--server-node"], { dest: "server_node", envVar: "server_node", defaultValue: "" })
      .addArgument(["--client-node"], { dest: "client_node", envVar: "client_node", defaultValue: "" })
      .addArgument(["--cluster-name"], { dest: "cluster_name", envVar: "clustername", defaultValue: "" })
      .addArgument(["--num-pairs"], { dest: "num_pairs", envVar: "num_pairs", defaultValue: "" })
      .addArgument(["--multus-client"], { dest: "multus_client", envVar: "multus_client", defaultValue: "" })
      .addArgument(["--network-policy"], { dest: "networkpolicy", envVar: "networkpolicy", defaultValue: "" })
      .addArgument(["--nodes-count"], { dest: "nodes_in_iter", envVar: "node_count", defaultValue: "" })
      .addArgument(["--pod-density"], { dest: "pod_density", envVar: "pod_count", defaultValue: "" })
      .addArgument(["--colocate"], { dest: "colocate", envVar: "colocate", defaultValue: "" })
      .addArgument(["--step-size"], { dest: "step_size", envVar: "stepsize", defaultValue: "" })
      // Exported by the operator as "<start>-<end>", e.g. 5-10 for a run that
      // grew from 5 to 10 nodes.
      .addArgument(["--density-range"], { dest: "density_range", envVar: "density_range", defaultValue: "" })
      .addArgument(["--node-range"], { dest: "node_range", envVar: "node_range", defaultValue: "" })
      // 0-based index of this pod among the pods sharing a node.
      .addArgument(["--pod-id"], { dest: "pod_id", envVar: "my_pod_idx", defaultValue: "" })
      .addArgument(["-u", "--uuid"], { dest: "uuid", envVar: "UUID", help: "Provide UUID of run" })
      .addArgument(["--user"], { dest: "user", envVar: "USER", help: "Provide user" });

    for (const dest of ["workload", "uuid", "user"]) this.requiredArgs.add(dest);
  }

  private get workload(): string | undefined {
    const value = this.config.workload;
    return typeof value === "string" && value.length ? value : undefined;
  }

  private get sampleCount(): number {
    const value = this.config.sample;
    return typeof value === "number" ? value : 1;
  }

  preflightChecks(): boolean {
    // Both checks run so every problem is logged in one pass.
    const checks = [this.checkRequiredArgs(), this.checkFile(this.workload)];
    return !checks.includes(false);
  }

  async setup(): Promise<void> {}

  async cleanup(): Promise<void> {}

  /** Runs uperf `sample` times, giving each sample three attempts. */
  async run(): Promise<BenchmarkRunResult> {
    const workload = this.workload;
    if (!workload) {
      this.logger.error("No workload file configured");
      return { ok: false, samples: [] };
    }

    const samples: string[] = [];
    for (let sampleNum = 1; sampleNum <= this.sampleCount; sampleNum++) {
      this.logger.info(`Starting Uperf sample number ${sampleNum}`);
      const sample = await this.runProcess(
        "uperf",
        ["-v", "-a", "-R", "-i", "1", "-m", workload],
        { retries: 2, expectedRc: 0 }
      );
      if (!sample.success) {
        this.logger.error("Uperf failed to run!", {
          sample: sampleNum,
          rc: sample.rc,
          attempts: sample.attempts,
          stderr: sample.stderr,
        });
        return { ok: false, samples };
      }
      this.logger.info(`Finished collecting sample ${sampleNum}`);
      this.logger.debug("Got results", { stdout: sample.stdout });
      samples.push(sample.stdout);
    }

    this.logger.info(`Successfully collected ${this.sampleCount} samples.`);
    return { ok: true, samples };
  }

  emitMetrics(samples: string[]): MetricDocument[] {
    const metadata = this.runMetadata();
    const documents: MetricDocument[] = [];

    samples.forEach((stdout, index) => {
      const { results, config } = Uperf.parseStdout(stdout);
      let previous: UperfResultRow | undefined;
      for (const row of results) {
        if (previous) {
          documents.push({
            ...metadata,
            ...config,
            ...Uperf.intervalMetrics(previous, row),
            iteration: index + 1,
            kind: "result",
          });
        }
        previous = row;
      }
    });

    return documents;
  }

  static parseStdout(stdout: string): UperfParsedSample {
    // Profile names follow "{test}-{proto}-{wsize}-{rsize}-{nthr}".
    const profileMatch = PROFILE_LINE.exec(stdout);
    if (!profileMatch) {
      throw new UperfParseError('No "running profile:" line in uperf output.');
    }
    const profile = profileMatch[1];
    const parts = profile.split("-");
    if (parts.length !== 5) {
      throw new UperfParseError(
        `Profile "${profile}" does not match <test>-<protocol>-<wsize>-<rsize>-<nthr>.`
      );
    }
    const [testType, protocol, wsize, rsize, nthr] = parts;

    const results = Array.from(stdout.matchAll(TXN_LINE), (m): UperfResultRow => [m[1], m[2], m[3]]);

    return {
      results,
      config: {
        test_type: testType,
        protocol,
        message_size: toInt(wsize, "write size", profile),
        read_message_size: toInt(rsize, "read size", profile),
        num_threads: toInt(nthr, "thread count", profile),
        duration: results.length,
      },
    };
  }

  private static intervalMetrics(previous: UperfResultRow, row: UperfResultRow): MetricDocument {
    const [prevTs, prevBytes, prevOps] = previous.map(Number);
    const [ts, bytes, ops] = row.map(Number);
    if ([prevTs, prevBytes, prevOps, ts, bytes, ops].some((n) => !Number.isFinite(n))) {
      throw new UperfParseError(`Non-numeric Txn2 row: ${row.join(" ")}`);
    }
    const normOps = ops - prevOps;
    return {
      timestamp: new Date(ts).toISOString(),
      bytes,
      norm_byte: bytes - prevBytes,
      ops,
      norm_ops: normOps,
      norm_ltcy: normOps > 0 ? ((ts - prevTs) / normOps) * 1000 : null,
    };
  }

  private runMetadata(): Record<string, MetricValue> {
    const metadata: Record<string, MetricValue> = {};
    for (const [key, value] of Object.entries(this.config)) {
      if (RUN_ONLY_ARGS.has(key)) continue;
      metadata[key] = value ?? null;
    }
    return metadata;
  }
}
