// Diagnostics go to stderr; stdout is reserved for results
export interface Diagnostics {
  debug(message: string): void;
  warn(message: string): void;
}

export type Output = (line: string) => void;

export function createConsoleDiagnostics(debugEnabled = false): Diagnostics {
  return {
    debug(message) {
      if (debugEnabled) {
        console.error(message);
      }
    },
    warn(message) {
      console.error(message);
    },
  };
}

export const consoleOutput: Output = (line) => {
  console.log(line);
};
