import 'dotenv/config';
import { loadConfig } from './config.js';
import { buildApp } from './app.js';
import { PlexClient } from './services/mediaServer/plex/client.js';
import { FfmpegTranscoder } from './services/transcoder/ffmpeg.js';
import { ClipService } from './services/clips.js';
import { ArtifactCatalog } from './services/artifacts.js';
import { createLogger } from './utils/logger.js';

async function start() {
  try {
    const config = loadConfig();

    const directory = new PlexClient({
      url: config.plex.url,
      token: config.plex.token,
      timeoutMs: config.plex.timeoutMs,
      logger: createLogger('plex', config.logLevel),
    });
    const transcoder = new FfmpegTranscoder({
      ...config.transcode,
      logger: createLogger('ffmpeg', config.logLevel),
    });
    const clips = new ClipService({
      transcoder,
      staticRoot: config.staticRoot,
      logger: createLogger('clips', config.logLevel),
    });
    const catalog = new ArtifactCatalog({
      transcoder,
      staticRoot: config.staticRoot,
      logger: createLogger('artifacts', config.logLevel),
    });

    await catalog.ensureDirectories();

    const app = await buildApp({
      directory,
      clips,
      catalog,
      verifyToken: (token) => PlexClient.verifyToken(token),
      staticRoot: config.staticRoot,
      serverConfigured: Boolean(config.plex.url && config.plex.token),
      corsOrigin: config.corsOrigin,
      logger: {
        level: config.logLevel,
        transport: config.prettyLogs
          ? { target: 'pino-pretty', options: { colorize: true } }
          : undefined,
      },
    });

    if (!(await directory.testConnection())) {
      app.log.warn(`Plex server at ${config.plex.url} is not reachable; session lookups will fail until it is`);
    }

    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Server running at http://${config.host}:${config.port}`);
  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

void start();
