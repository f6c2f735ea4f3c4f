import { GameClientOrchestrator } from "./client-manager";
import {
  FileCredentialStore,
  HttpCredentialValidator,
  resolveCredentialDirectory,
} from "./credential-store";
import { loadSessionConfigurationFromEnvironment } from "./session-config";

const timestamp = (): string => new Date().toISOString();

const logLine = (message: string): void => {
  process.stdout.write(`${timestamp()} ${message}\n`);
};

const errorLine = (error: Error): void => {
  process.stderr.write(`${timestamp()} error: ${error.message}\n`);
};

const main = async (): Promise<void> => {
  const configuration = loadSessionConfigurationFromEnvironment();
  const credentialDirectory = resolveCredentialDirectory(configuration);
  const orchestrator = new GameClientOrchestrator(configuration, {
    credentials: new FileCredentialStore(credentialDirectory),
    validator: new HttpCredentialValidator({ apiBase: configuration.apiBase }),
  });

  logLine(`Starting ${configuration.platform} client (credentials in ${credentialDirectory})`);
  await orchestrator.boot({
    onReady: () => {
      logLine(`Signed in as ${orchestrator.playerName}`);
    },
    onError: errorLine,
    onLog: logLine,
  });

  const frameMs = 1000 / configuration.tickRate;
  let lastFrameAt = performance.now();
  let lastStatus = "";
  const timer = setInterval(() => {
    const frameAt = performance.now();
    const frame = orchestrator.tick(frameAt - lastFrameAt);
    lastFrameAt = frameAt;
    if (frame.status !== lastStatus) {
      lastStatus = frame.status;
      logLine(`Status: ${frame.status}`);
    }
  }, frameMs);

  const stop = (signal: NodeJS.Signals): void => {
    logLine(`Received ${signal}, shutting down`);
    clearInterval(timer);
    orchestrator.shutdown();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
};

main().catch((error: unknown) => {
  errorLine(error instanceof Error ? error : new Error(String(error)));
  process.exitCode = 1;
});
