/**
 * Progress reporting passed explicitly through the extraction pipeline.
 */

export interface Reporter {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

/**
 * Reporter printing to the console. Debug messages are printed only when `verbose` is set.
 */
export function createConsoleReporter({ verbose = false }: { readonly verbose?: boolean } = {}): Reporter {
  return {
    debug(message: string): void {
      if (verbose) {
        console.log(message);
      }
    },
    info(message: string): void {
      console.log(message);
    },
    warn(message: string): void {
      console.warn(`⚠️  ${message}`);
    },
  };
}

export const silentReporter: Reporter = {
  debug(): void {},
  info(): void {},
  warn(): void {},
};
