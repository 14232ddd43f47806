import {
  LifecycleController,
  TmuxClient,
  err,
  loadSettings,
  ok,
  validateName,
  validatePort,
  type Result,
} from "../lifecycle";
import { CLI_USAGE_TEXT } from "./config/usage";
import { formatInstanceList } from "./commands/list";
import type { CliEnvironment, CommandFlags } from "./types";

export function processEnvironment(): CliEnvironment {
  return {
    cwd: process.cwd(),
    env: process.env,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    createMultiplexer: (settings) => new TmuxClient({ verbose: settings.verbose }),
  };
}

// Accepts `--flag value` and `--flag=value`; anything else is an input error.
export function parseFlags(args: string[], allowed: readonly string[]): Result<CommandFlags> {
  const flags: CommandFlags = new Map();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg.startsWith("--")) {
      return err("InvalidInput", `unexpected argument: ${arg}`);
    }

    let key = arg;
    let value: string | undefined;

    const eq = arg.indexOf("=");
    if (eq !== -1) {
      key = arg.slice(0, eq);
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      if (value === undefined || value.startsWith("--")) {
        value = undefined;
      } else {
        i++;
      }
    }

    if (!allowed.includes(key)) {
      return err("InvalidInput", `unknown option: ${key}`);
    }
    if (value === undefined) {
      return err("InvalidInput", `${key} requires a value`);
    }

    flags.set(key, value);
  }

  return ok(flags);
}

function requireFlag(flags: CommandFlags, key: string): Result<string> {
  const value = flags.get(key);
  return value === undefined ? err("InvalidInput", `${key} is required`) : ok(value);
}

function dispatch(command: string, args: string[], environment: CliEnvironment): Result<string> {
  const settings = loadSettings(environment.env);
  if (!settings.ok) {
    return settings;
  }

  const controller = new LifecycleController({
    session: settings.value.session,
    root: environment.cwd,
    artifactName: settings.value.artifactName,
    runtime: settings.value.runtime,
    multiplexer: environment.createMultiplexer(settings.value),
  });

  switch (command) {
    case "start": {
      const flags = parseFlags(args, ["--name", "--port"]);
      if (!flags.ok) return flags;

      const rawName = requireFlag(flags.value, "--name");
      if (!rawName.ok) return rawName;
      const rawPort = requireFlag(flags.value, "--port");
      if (!rawPort.ok) return rawPort;

      const name = validateName(rawName.value);
      if (!name.ok) return name;
      const port = validatePort(rawPort.value);
      if (!port.ok) return port;

      const started = controller.start(name.value, port.value);
      return started.ok ? ok(`${started.value}\n`) : started;
    }

    case "stop": {
      const flags = parseFlags(args, ["--name"]);
      if (!flags.ok) return flags;

      const rawName = requireFlag(flags.value, "--name");
      if (!rawName.ok) return rawName;

      const name = validateName(rawName.value);
      if (!name.ok) return name;

      const stopped = controller.stop(name.value);
      return stopped.ok ? ok(`${stopped.value}\n`) : stopped;
    }

    case "stop_all": {
      const flags = parseFlags(args, []);
      if (!flags.ok) return flags;

      const stopped = controller.stopAll();
      return stopped.ok ? ok(`${stopped.value}\n`) : stopped;
    }

    case "collect_all": {
      const flags = parseFlags(args, []);
      if (!flags.ok) return flags;

      return controller.collectAll();
    }

    case "list": {
      const flags = parseFlags(args, []);
      if (!flags.ok) return flags;

      const statuses = controller.status();
      return statuses.ok ? ok(formatInstanceList(statuses.value)) : statuses;
    }

    default:
      return err("InvalidInput", `unknown command: ${command}`);
  }
}

const COMMANDS = new Set(["start", "stop", "stop_all", "collect_all", "list"]);

// Main CLI dispatcher; the only place a failure becomes an exit code.
export function runCli(argv: string[], environment: CliEnvironment = processEnvironment()): number {
  const command: string | undefined = argv[0];
  const args = argv.slice(1);

  if (command === "--help" || command === "-h") {
    environment.stdout(CLI_USAGE_TEXT);
    return 0;
  }

  if (command === undefined || !COMMANDS.has(command)) {
    if (command !== undefined) {
      environment.stderr(`Error: unknown command: ${command}\n\n`);
    }
    environment.stderr(CLI_USAGE_TEXT);
    return 1;
  }

  const result = dispatch(command, args, environment);
  if (!result.ok) {
    environment.stderr(`Error: ${result.error.message}\n`);
    return 1;
  }

  environment.stdout(result.value);
  return 0;
}
