#!/usr/bin/env node
import { parseArgs } from "./lib/args";
import { loadConfig } from "./lib/config";
import { createLogger } from "./lib/logger";
import { createFeedService } from "./pipeline/service";
import { formatBytes, formatMs } from "../src/lib/format";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const log = createLogger({ verbose: args.verbose });
  const service = createFeedService(config, { log });

  if (args.clean) {
    await service.clean();
    log.info(`[CLEAN] ${config.cacheDir}`);
    return;
  }

  if (args.stats) {
    const { files, bytes } = await service.stats();
    log.info(`Cache: ${files} files, ${formatBytes(bytes)}`);
    return;
  }

  const start = Date.now();
  const loaded = await service.start();
  log.debug(`[LOAD] items=${loaded.length} dir=${config.cacheDir} years=${config.parser.allowedYears.join(",")}`);

  const result = await log.group(`refresh days=${args.days}`, () =>
    service.refresh(args.days, { dryRun: args.dryRun })
  );
  if (result.sweep) {
    const s = result.sweep;
    log.info(`[SWEEP] removed=${s.removedByAge + s.removedByCapacity} remaining=${s.remainingFiles} (${formatBytes(s.remainingBytes)})`);
  }

  if (args.thumbs && !args.dryRun) {
    const { attempted, cached } = await service.prefetchThumbnails();
    log.info(`[THUMB] cached=${cached}/${attempted}`);
  }

  const fallbacks = result.reports.filter((r) => r.used === "fallback").length;
  log.info(
    `[DONE] items=${result.items.length} sources=${result.reports.length} fallback=${fallbacks} took=${formatMs(Date.now() - start)}`
  );
}

main().catch((err) => {
  const message = err instanceof Error ? err.stack ?? err.message : String(err);
  console.error(message);
  process.exitCode = 1;
});
