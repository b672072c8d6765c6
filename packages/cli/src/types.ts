export type CliResponse = {
  stdout?: string;
  stderr?: string;
  exitCode: number;
};

export type CliRequest = {
  argv: readonly string[];
  /** Default library root when --root is absent */
  cwd?: string;
  color?: boolean;
};
