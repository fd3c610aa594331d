/**
 * Where the menu writes what it has to say
 */
export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export const consoleOutput: Output = {
  log: (line) => {
    console.log(line);
  },
  error: (line) => {
    console.error(line);
  },
};
