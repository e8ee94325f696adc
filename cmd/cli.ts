#!/usr/bin/env node

/**
 * Archive Insights CLI
 * 分析 Twitter/X 归档：网络、内容与增长报告
 */

import { promises as fs } from "fs";
import * as path from "path";
import { Command, CommanderError, InvalidArgumentError } from "commander";
import { SNAPSHOT_FILENAME } from "../config/constants";
import { loadArchive } from "../core/archive-loader";
import { createDataServiceClient } from "../core/data-service-client";
import { loadFromDataService } from "../core/data-service-adapter";
import { AnalyticsError, ErrorClassifier } from "../core/errors";
import { compareSnapshots, trackGoals } from "../core/growth-comparator";
import { buildMetricsSnapshot, parseSnapshotJson, snapshotToJson, toMetricsJson } from "../core/metrics";
import type { AppConfig } from "../types/config";
import type { MetricsSnapshot } from "../types/metrics";
import {
  closeLogger,
  ConfigManager,
  configureLogger,
  createEnhancedLogger,
  createRunContext,
  exportAll,
  renderGoalReport,
  renderGrowthReport,
  renderTextReport,
} from "../utils";

const logger = createEnhancedLogger("CLI");

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

interface GlobalOptions {
  config?: string;
  debug?: boolean;
}

function parseNumber(label: string) {
  return (value: string): number => {
    const parsed = Number(value);
    if (value.trim() === "" || !Number.isFinite(parsed) || parsed <= 0) {
      throw new InvalidArgumentError(`${label} must be a positive number.`);
    }
    return parsed;
  };
}

function withNewline(text: string): string {
  return text.endsWith("\n") ? text : `${text}\n`;
}

// 创建命令行程序
export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  const loadConfig = (): AppConfig => {
    const { config: configPath, debug } = program.opts<GlobalOptions>();
    const config = new ConfigManager(configPath).getConfig();
    configureLogger(debug ? { ...config.logging, level: "debug" } : config.logging);
    return config;
  };

  const analyzeArchive = async (archiveDir: string, config: AppConfig) => {
    const archive = await loadArchive(archiveDir, { logger });
    for (const skipped of archive.skippedFiles) {
      io.stderr(`Skipped ${skipped.file}: ${skipped.reason}\n`);
    }
    const metrics = logger.trackSync("buildMetrics", () => buildMetricsSnapshot(archive, config), {
      tweets: archive.tweets.length,
    });
    return { archive, metrics };
  };

  /**
   * A `snapshot.json` file, an export run directory holding one, or an archive directory analysed on the spot
   */
  const loadSnapshot = async (target: string, config: AppConfig): Promise<MetricsSnapshot> => {
    const stat = await fs.stat(target).catch(() => null);
    if (stat?.isFile()) {
      return parseSnapshotJson(await fs.readFile(target, "utf-8"), target);
    }
    if (stat?.isDirectory()) {
      const snapshotFile = path.join(target, SNAPSHOT_FILENAME);
      const nested = await fs.stat(snapshotFile).catch(() => null);
      if (nested?.isFile()) {
        return parseSnapshotJson(await fs.readFile(snapshotFile, "utf-8"), snapshotFile);
      }
    }
    return (await analyzeArchive(target, config)).metrics;
  };

  program
    .name("archive-insights")
    .description("Analytics for Twitter/X data archives: network, content and growth reports")
    .version("1.0.0")
    .option("-c, --config <file>", "JSON config file (defaults to ANALYTICS_CONFIG)")
    .option("-d, --debug", "Enable debug logs and stack traces")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });

  // `archive-insights <archiveDir>` runs the report
  program
    .command("report", { isDefault: true })
    .description("Analyse an archive and print the report")
    .argument("<archiveDir>", "archive root (the directory that contains data/)")
    .option("--json", "Print metrics JSON instead of the text report")
    .action(async (archiveDir: string, options: { json?: boolean }) => {
      const config = loadConfig();
      const { metrics } = await analyzeArchive(archiveDir, config);
      if (options.json) {
        io.stdout(withNewline(JSON.stringify(toMetricsJson(metrics, config.analysis.topN), null, 2)));
      } else {
        io.stdout(withNewline(renderTextReport(metrics, { timezone: config.analysis.timezone })));
      }
    });

  program
    .command("export")
    .description("Write CSV files, metrics.json and snapshot.json")
    .argument("<archiveDir>", "archive root")
    .option("-o, --output <dir>", "Output directory (defaults to output.baseDir)")
    .action(async (archiveDir: string, options: { output?: string }) => {
      const config = loadConfig();
      const { archive, metrics } = await analyzeArchive(archiveDir, config);
      const runContext = await createRunContext({
        handle: metrics.account.handle ?? metrics.account.accountId,
        baseOutputDir: options.output ?? config.output.baseDir,
        timezone: config.analysis.timezone,
      });
      const result = await exportAll(archive, metrics, runContext, { topN: config.analysis.topN });
      io.stdout(`Exported ${result.files.length} files to ${result.runDir}\n`);
    });

  program
    .command("compare")
    .description("Compare two archives (or snapshot.json files) of the same account")
    .argument("<old>", "older archive directory or snapshot.json")
    .argument("<new>", "newer archive directory or snapshot.json")
    .option("--json", "Print the growth report as JSON")
    .action(async (oldTarget: string, newTarget: string, options: { json?: boolean }) => {
      const config = loadConfig();
      const [oldSnapshot, newSnapshot] = await Promise.all([
        loadSnapshot(oldTarget, config),
        loadSnapshot(newTarget, config),
      ]);
      const report = compareSnapshots(oldSnapshot, newSnapshot);
      io.stdout(withNewline(options.json ? JSON.stringify(report, null, 2) : renderGrowthReport(report)));
    });

  program
    .command("goals")
    .description("Track progress towards follower and engagement goals")
    .argument("<archiveDir>", "archive directory or snapshot.json")
    .option("--followers <count>", "Target follower count", parseNumber("--followers"))
    .option("--engagement <percent>", "Target engagement rate in percent", parseNumber("--engagement"))
    .action(async (target: string, options: { followers?: number; engagement?: number }) => {
      const config = loadConfig();
      const snapshot = await loadSnapshot(target, config);
      const progress = trackGoals(snapshot, {
        followers: options.followers,
        engagementRate: options.engagement,
      });
      io.stdout(withNewline(renderGoalReport(snapshot, progress)));
    });

  program
    .command("fetch")
    .description("Build a report from the data service instead of an archive")
    .argument("<username>", "account handle, without @")
    .option("--limit <count>", "Maximum number of tweets to fetch", parseNumber("--limit"))
    .option("--json", "Print metrics JSON instead of the text report")
    .option("--save <file>", "Also write the snapshot to this file")
    .action(async (username: string, options: { limit?: number; json?: boolean; save?: string }) => {
      const config = loadConfig();
      const client = createDataServiceClient(config.dataService);
      const archive = await loadFromDataService(client, username.replace(/^@/, ""), {
        tweetLimit: options.limit === undefined ? undefined : Math.floor(options.limit),
        logger,
      });
      const metrics = logger.trackSync("buildMetrics", () => buildMetricsSnapshot(archive, config), {
        tweets: archive.tweets.length,
      });
      if (options.save) {
        await fs.mkdir(path.dirname(path.resolve(options.save)), { recursive: true });
        await fs.writeFile(options.save, `${JSON.stringify(snapshotToJson(metrics), null, 2)}\n`, "utf-8");
      }
      io.stdout(
        withNewline(
          options.json
            ? JSON.stringify(toMetricsJson(metrics, config.analysis.topN), null, 2)
            : renderTextReport(metrics, { timezone: config.analysis.timezone })
        )
      );
    });

  return program;
}

/**
 * Runs the CLI and resolves to the process exit code
 */
export async function main(argv: string[] = process.argv, io: CliIO = processIO): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // commander already printed its message
      return error.exitCode;
    }

    const classified = error instanceof AnalyticsError ? error : ErrorClassifier.classify(error);
    io.stderr(`Error: ${classified.getUserMessage()}\n`);
    if (program.opts<GlobalOptions>().debug && classified.stack) {
      io.stderr(`${classified.stack}\n`);
    }
    logger.debug("Command failed", { code: classified.code });
    return 1;
  }
}

if (require.main === module) {
  void main()
    .then((code) => {
      process.exitCode = code;
    })
    .finally(() => closeLogger());
}
