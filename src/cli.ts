import { loadConfig, type Config } from './config.js';
import { Agent } from './agent.js';
import { ConfigError } from './errors.js';
import { logger, errorMessage } from './utils/logger.js';

export const USAGE = 'Usage: bangla-voice-agent [dev]';

export interface AgentRunner {
  run(): Promise<void>;
  stop(): Promise<void>;
}

export interface CliDeps {
  createAgent?: (config: Config) => AgentRunner;
  /**
   * Registers a shutdown hook for SIGINT / SIGTERM
   */
  onSignal?: (handler: (signal: NodeJS.Signals) => void) => void;
  print?: (line: string) => void;
}

function onProcessSignal(handler: (signal: NodeJS.Signals) => void): void {
  process.once('SIGINT', handler);
  process.once('SIGTERM', handler);
}

/**
 * Run the command line. Resolves with the process exit code.
 */
export async function main(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  deps: CliDeps = {},
): Promise<number> {
  const print = deps.print ?? ((line: string) => console.error(line));
  const command = argv[0] ?? 'dev';

  if (command !== 'dev') {
    print(`Unknown command: ${command}`);
    print(USAGE);
    return 1;
  }

  // Fail fast on configuration before touching the network
  let config: Config;
  try {
    config = loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      print(error.message);
      return 1;
    }
    throw error;
  }

  logger.level = config.logLevel;
  logger.info('Starting Bangla voice agent', {
    room: config.room.name,
    stt: config.stt.provider,
    llm: config.llm.provider,
    tts: config.tts.provider,
  });

  const agent = deps.createAgent ? deps.createAgent(config) : new Agent(config);

  (deps.onSignal ?? onProcessSignal)((signal) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    agent.stop().catch((error: unknown) => {
      logger.error(`Failed to stop agent: ${errorMessage(error)}`);
    });
  });

  try {
    await agent.run();
  } catch (error) {
    logger.error(`Failed to start agent: ${errorMessage(error)}`);
    await agent.stop();
    return 1;
  }

  return 0;
}
