import { getConfig, validateConfig } from '../lib/config';
import { initDatabase } from './db';
import { createArtifactStore } from './storage';
import { createRenderer } from './render/renderPreview';
import { SubmissionService } from './submissions';
import { ThemeCatalog } from './themes';
import { createApp } from './app';

// Validate configuration at startup
validateConfig();
const config = getConfig();

async function main() {
  const repo = await initDatabase(config);
  const store = createArtifactStore(config);
  const renderer = createRenderer(config.preview);

  const submissions = new SubmissionService(repo, store, renderer, config);
  const catalog = new ThemeCatalog(repo, store, config);

  const server = createApp({ repo, submissions, catalog, config });

  const httpServer = server.listen(config.port, () => {
    console.log(`🚀 Server ready at http://localhost:${config.port}`);
    console.log(`📦 Artifacts: ${store.kind}`);
    if (!config.isDev) {
      console.log(`🌐 Public URL: ${config.publicUrl}`);
    }
  });

  const shutdown = (signal: string) => {
    console.log(`🛑 ${signal} received, shutting down`);
    httpServer.close(() => {
      repo.close().then(
        () => process.exit(0),
        (err) => {
          console.error('Failed to close database:', err);
          process.exit(1);
        }
      );
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
