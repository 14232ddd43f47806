import type { MultiplexerClient, Settings } from "../lifecycle";

// Process surroundings handed to `runCli`; tests swap in fakes.
export interface CliEnvironment {
  cwd: string;
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  createMultiplexer: (settings: Settings) => MultiplexerClient;
}

// Parsed `--flag value` pairs for a single subcommand.
export type CommandFlags = Map<string, string>;
