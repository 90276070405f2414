import { loadConfig } from '@/config';
import { createLogger, logManager } from '@/shared/logging/logger';
import { resolveMediaHost } from '@/shared/utils/net';
import { toSnapshotNotification } from '@/domain/playback/notifications';
import { CommandQueue } from '@/application/playback/commandQueue';
import { PlaybackController } from '@/application/playback/playbackController';
import { ReconciliationMonitor } from '@/application/playback/reconciliationMonitor';
import { PlaybackFacade } from '@/application/playback/playbackFacade';
import { JsonCatalog } from '@/adapters/catalog/jsonCatalog';
import { createSonosDriverFactory } from '@/adapters/device/sonos/sonosUpnpDriver';
import { EventBroadcaster } from '@/adapters/events/eventBroadcaster';
import { BroadcastNotifier } from '@/adapters/events/broadcastNotifier';
import { JukeboxApiHandler } from '@/adapters/http/api/jukeboxApiHandler';
import { SseGateway } from '@/adapters/http/events/sseGateway';
import { WsGateway } from '@/adapters/http/events/wsGateway';
import { HttpService } from '@/adapters/http/httpService';
import { createRuntimePorts } from '@/runtime/ports';
import { stopWithTimeout } from '@/runtime/stopWithTimeout';

/**
 * Descriptor for services that need graceful shutdown coordination.
 */
type LifecycleService = {
  name: string;
  stop: () => Promise<void>;
  timeoutMs: number;
};

export type Runtime = {
  start: () => Promise<void>;
  stop: () => Promise<void>;
};

export function createRuntime(): Runtime {
  const ports = createRuntimePorts();
  let services: LifecycleService[] = [];

  async function startServices(): Promise<void> {
    const config = loadConfig();
    logManager.configure({ level: config.env.logLevel });
    const stored = await ports.config.load();
    logManager.configure({ level: stored.logging.level, json: stored.logging.json });
    const log = createLogger('Server');

    log.info('bootstrapping jukebox server', { env: config.env.nodeEnv });

    const mediaHost = resolveMediaHost(stored.media.host);
    const catalog = new JsonCatalog({
      storage: ports.storage,
      catalogPath: stored.catalog.path,
      media: { ...stored.media, host: mediaHost },
    });
    await catalog.load();

    if (!stored.device.host) {
      log.warn('no device host configured; set device.host in data/config.json');
    }
    const driverFactory = createSonosDriverFactory({
      port: stored.device.port,
      commandTimeoutMs: stored.device.commandTimeoutMs,
    });

    const queue = new CommandQueue({ capacity: stored.controller.commandQueueCapacity });
    const controller = new PlaybackController({
      driver: driverFactory(stored.device.host),
      driverFactory,
      catalog,
      queue,
      dequeueTimeoutMs: stored.controller.dequeueTimeoutMs,
      volumeStep: stored.controller.volumeStep,
    });
    const monitor = new ReconciliationMonitor({
      playback: controller,
      queue,
      pollIntervalMs: stored.monitor.pollIntervalMs,
      errorBackoffMs: stored.monitor.errorBackoffMs,
      enqueueTimeoutMs: stored.controller.enqueueTimeoutMs,
    });
    const facade = new PlaybackFacade(controller, queue, {
      enqueueTimeoutMs: stored.controller.enqueueTimeoutMs,
    });

    const broadcaster = new EventBroadcaster(stored.events.mailboxSize);
    controller.registerHooks(new BroadcastNotifier(broadcaster));
    const snapshot = () => ({
      type: 'snapshot' as const,
      data: toSnapshotNotification(controller.getSnapshot()),
    });

    const httpService = new HttpService(config.http, {
      api: new JukeboxApiHandler({
        facade,
        catalog,
        extraStats: () => ({ events: broadcaster.getStats() }),
        maxBodyBytes: config.http.maxBodyBytes,
      }),
      sse: new SseGateway({ broadcaster, snapshot, keepaliveMs: stored.events.keepaliveMs }),
      ws: new WsGateway({ broadcaster, snapshot, keepaliveMs: stored.events.keepaliveMs }),
    });

    controller.start();
    monitor.start();
    await httpService.start();

    services = [
      { name: 'monitor', stop: () => monitor.stop(), timeoutMs: stored.controller.stopTimeoutMs },
      { name: 'controller', stop: () => controller.stop(), timeoutMs: stored.controller.stopTimeoutMs },
      {
        name: 'http',
        stop: async () => {
          broadcaster.close();
          await httpService.stop();
        },
        timeoutMs: 6000,
      },
    ];

    log.info('startup complete', { device: stored.device.host, mediaHost, albums: catalog.albumCount });
  }

  async function stopServices(): Promise<void> {
    const log = createLogger('Server');
    // Sequential: monitor, then controller, then http.
    for (const service of services) {
      await stopWithTimeout(service.name, service.stop, service.timeoutMs, log);
    }
    services = [];
  }

  return {
    start: startServices,
    stop: stopServices,
  };
}
