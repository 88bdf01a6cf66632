/**
 * modules/engine/src/main.ts
 *
 * @file Entry point: loads the configuration, sets up logging, connects the X11 adapter to the dispatch pipeline and
 * reads triggers from stdin until the stream ends or the process is told to stop.
 *
 * Usage: `tilewright [--config <file>] < fifo`
 */
import process from 'node:process';
import {parseArgs} from 'node:util';
import {describeError} from '@common/core/errors.js';
import {loadConfig} from './config/loadConfig.js';
import {DispatchPipeline} from './dispatch/DispatchPipeline.js';
import {getLogger, setupLogging} from './logging/index.js';
import {LineTriggerSource} from './triggers/LineTriggerSource.js';
import {X11EventWatcher} from './x11/X11EventWatcher.js';
import {X11WindowSystem} from './x11/X11WindowSystem.js';

const log = getLogger('engine.main');

function stopSignal(): Promise<string> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve('SIGINT'));
    process.once('SIGTERM', () => resolve('SIGTERM'));
  });
}

async function main(): Promise<void> {
  const {values} = parseArgs({options: {config: {type: 'string', short: 'c'}}});
  const config = await loadConfig(values.config);
  await setupLogging({
    level: config.logging.level,
    directory: config.logging.directory,
    version: process.env.npm_package_version,
  });

  const x11 = new X11WindowSystem({commandTimeoutMs: config.x11.commandTimeoutMs});
  const pipeline = new DispatchPipeline({
    source: x11,
    sink: x11,
    grid: config.grid,
    spanGrow: config.spanGrow,
    awaitConfirmation: config.dispatch.awaitConfirmation,
    captureTimeoutMs: config.dispatch.captureTimeoutMs,
  });

  const watcher = new X11EventWatcher(x11, {
    pollIntervalMs: config.x11.pollIntervalMs,
    geometryDebounceMs: config.x11.geometryDebounceMs,
  });
  const detach = pipeline.attach(watcher);
  watcher.start();

  const triggers = new LineTriggerSource(process.stdin, config.bindings);
  const unsubscribe = triggers.subscribe((request, timestamp) => {
    pipeline.submit({request, timestamp})
      .then(outcome => log.debug(`${request.kind} @${timestamp}: ${outcome.status}`))
      .catch(reason => log.error('error during dispatch', reason));
  });
  if (config.bindings.size === 0) {
    log.warn('no key bindings configured; every trigger will be ignored');
  }
  log.info(`ready, ${config.bindings.size} bindings: ${config.bindings.chords.join(', ')}`);

  const reason = await Promise.race([triggers.closed.then(() => 'end of input'), stopSignal()]);
  log.info(`shutting down (${reason})`);
  unsubscribe();
  watcher.stop();
  detach();
  await pipeline.close();
  process.stdin.destroy();
}

main().catch((reason) => {
  log.error(`tilewright failed to start: ${describeError(reason)}`);
  process.exitCode = 1;
});
