export type SyncArgs = {
  days: number;
  dryRun: boolean;
  thumbs: boolean;
  stats: boolean;
  clean: boolean;
  verbose: boolean;
};

export function parseArgs(argv: string[]): SyncArgs {
  const args: SyncArgs = {
    days: 7,
    dryRun: false,
    thumbs: false,
    stats: false,
    clean: false,
    verbose: false
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === "--dry-run") {
      args.dryRun = true;
      continue;
    }
    if (token === "--thumbs") {
      args.thumbs = true;
      continue;
    }
    if (token === "--stats") {
      args.stats = true;
      continue;
    }
    if (token === "--clean") {
      args.clean = true;
      continue;
    }
    if (token === "--verbose") {
      args.verbose = true;
      continue;
    }
    if (token === "--days") {
      const value = Number(argv[i + 1]);
      if (!Number.isFinite(value) || value <= 0) throw new Error("--days 必须是正整数");
      args.days = Math.floor(value);
      i += 1;
      continue;
    }
  }

  return args;
}
