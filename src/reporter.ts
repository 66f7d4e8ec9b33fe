export type Reporter = {
  info(message: string): void;
  warn(message: string): void;
};

export const silentReporter: Reporter = {
  info: () => {},
  warn: () => {}
};

/**
 * Progress lines for interactive use. In JSON mode stdout is reserved for the
 * single result object, so progress moves to stderr.
 */
export function createConsoleReporter(args: { json: boolean }): Reporter {
  const infoStream = args.json ? process.stderr : process.stdout;
  return {
    info: (message) => {
      infoStream.write(`${message}\n`);
    },
    warn: (message) => {
      process.stderr.write(`WARN: ${message}\n`);
    }
  };
}

export type CollectingReporter = Reporter & {
  infos: string[];
  warnings: string[];
};

export function createCollectingReporter(): CollectingReporter {
  const infos: string[] = [];
  const warnings: string[] = [];
  return {
    infos,
    warnings,
    info: (message) => {
      infos.push(message);
    },
    warn: (message) => {
      warnings.push(message);
    }
  };
}
