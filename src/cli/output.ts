import type { Writable } from "node:stream";

export type Verbosity = "silent" | "normal" | "verbose";

/** Progress and diagnostic lines. Never carries report output. */
export interface Diagnostics {
  info(message: string): void;
  detail(message: string): void;
}

export function createDiagnostics(
  verbosity: Verbosity,
  stream: Writable = process.stderr,
): Diagnostics {
  const write = (message: string): void => {
    stream.write(message + "\n");
  };
  return {
    info: (message) => {
      if (verbosity !== "silent") {
        write(message);
      }
    },
    detail: (message) => {
      if (verbosity === "verbose") {
        write(message);
      }
    },
  };
}

export function resolveVerbosity(options: {
  readonly quiet?: boolean;
  readonly verbose?: boolean;
  readonly total?: boolean;
}): Verbosity {
  if (options.quiet || options.total) {
    return "silent";
  }
  return options.verbose ? "verbose" : "normal";
}

export async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

export async function writeError(error: unknown): Promise<void> {
  const message = error instanceof Error ? error.message : String(error);
  await new Promise<void>((resolve) => {
    process.stderr.write(message + "\n", () => resolve());
  });
}
