import { loadCliConfig, type LoadedCliConfig } from "./config.js";
import { createCliContext, type CliContext, type CliContextOverrides } from "./context.js";
import { runDoctorCommand } from "./doctor.js";
import { runGatewayCommand } from "./gateway-run.js";
import { runLogsCommand } from "./logs.js";
import { runModelsCommand, runPullCommand } from "./models.js";
import { runPortsCommand } from "./ports.js";
import { runRestartCommand, runStartCommand, runStatusCommand, runStopCommand } from "./services.js";
import { runSetupCommand } from "./setup.js";
import { runTestCommand } from "./test-command.js";

export const USAGE = [
  "Usage: ferry {start|stop|status|restart|logs|test|models|pull|ports|gateway|setup|doctor|help}",
  "",
  "Commands:",
  "  start [unit]        Start services (daemon and gateway by default; unit: daemon|gateway|worker|all)",
  "  stop [unit] [--force]",
  "                      Stop services",
  "  status              Check service status",
  "  restart [unit]      Restart services; `restart all` restarts daemon, gateway, then worker",
  "  logs [unit] [--lines N]",
  "                      Show recent logs",
  "  test [--prompt P]   Test gateway health and one inference",
  "  models              List installed models",
  "  pull <model_name>   Download a new model",
  "  ports               Show listening ports",
  "  gateway [--port N] [--model M]",
  "                      Run the gateway in the foreground",
  "  setup [--model M] [--port N] [--reconfigure] [--skip-pull]",
  "                      Choose a model and persist the gateway port",
  "  doctor [--auto] [--benchmark]",
  "                      Diagnose problems (interactive menu unless --auto)"
].join("\n");

function printHelp(stream: NodeJS.WriteStream = process.stdout): void {
  stream.write(`${USAGE}\n`);
}

type CommandHandler = (context: CliContext, args: string[], loaded: LoadedCliConfig) => Promise<number>;

const COMMANDS: Record<string, CommandHandler> = {
  start: runStartCommand,
  stop: runStopCommand,
  status: (context) => runStatusCommand(context),
  restart: runRestartCommand,
  logs: runLogsCommand,
  test: runTestCommand,
  models: (context) => runModelsCommand(context),
  pull: runPullCommand,
  ports: (context) => runPortsCommand(context),
  gateway: (_context, args, loaded) => runGatewayCommand(loaded.config, args),
  setup: (context, args) => runSetupCommand(context, args),
  doctor: runDoctorCommand
};

export async function runCommand(
  argv: string[],
  options: {
    projectRoot?: string;
    env?: NodeJS.ProcessEnv;
    overrides?: CliContextOverrides;
  } = {}
): Promise<number> {
  const [command, ...args] = argv;

  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return 0;
  }

  const handler = Object.hasOwn(COMMANDS, command) ? COMMANDS[command] : undefined;
  if (!handler) {
    process.stderr.write(`Unknown command: ${command}\n`);
    printHelp(process.stderr);
    return 1;
  }

  const loaded = await loadCliConfig(options.projectRoot, { env: options.env });
  const context = createCliContext(loaded.config, options.overrides);
  return await handler(context, args, loaded);
}
