/**
 * Relay API: main entry point.
 *
 * Wires up the blob store, document store, transcriber and session
 * variants, runs the storage pre-check, then opens the readiness gate
 * after the server is listening.
 */

import { rootLogger } from "@clinic-relay/logging";
import {
  CloudBlobStore,
  MemoryBlobStore,
  openCloudBucket,
  type BlobStore,
} from "@clinic-relay/blob-store";
import { DocumentStore } from "@clinic-relay/document-store";
import { OpenAITranscriber } from "@clinic-relay/stt-openai";
import type { RelayConfig } from "@clinic-relay/shared-types";
import { describeError } from "@clinic-relay/shared-types";
import { createRelayServer, type ServerDeps } from "./server.js";
import { loadConfig } from "./config-loader.js";
import { transcriberVariant, playbackVariant } from "./session-variants.js";

const log = rootLogger.child({ component: "startup" });

function buildBlobStore(config: RelayConfig): BlobStore {
  if (config.storage.backend === "memory") {
    log.warn("Using in-memory blob store; documents are lost on restart");
    return new MemoryBlobStore();
  }
  const bucket = openCloudBucket({
    bucket: config.storage.bucket,
    projectId: config.storage.projectId,
  });
  return new CloudBlobStore(bucket, rootLogger);
}

async function main(): Promise<void> {
  log.info("Loading configuration");
  const config = loadConfig();

  const blobs = buildBlobStore(config);
  const documents = new DocumentStore(blobs, rootLogger, {
    rootPrefix: config.storage.rootPrefix,
    seedFileName: config.session.seedFileName,
  });
  const transcriber = new OpenAITranscriber(config.transcription, rootLogger);

  const variants = [
    transcriberVariant({
      documents,
      seedFileName: config.session.seedFileName,
      transcriber,
      transcription: config.transcription,
    }),
    playbackVariant({ documents, playback: config.playback }),
  ];

  // Create server with readiness gate closed
  const deps: ServerDeps = {
    documents,
    blobs,
    variants,
    config,
    logger: rootLogger,
    ready: false,
  };
  const relay = createRelayServer(deps);

  // Startup pre-checks with bounded timeout
  const startupTimeout = setTimeout(() => {
    log.error("Startup timed out after 30s");
    process.exit(1);
  }, 30_000);

  log.info("Running startup pre-checks");
  const [storageHealth, sttHealth] = await Promise.all([
    blobs.healthCheck(),
    transcriber.healthCheck(),
  ]);
  clearTimeout(startupTimeout);

  if (!storageHealth.healthy) {
    log.error("Startup pre-check failed", { storage: storageHealth });
    process.exit(1);
  }
  if (!sttHealth.healthy) {
    log.warn("Transcriber unavailable; transcriber sessions will report errors", {
      stt: sttHealth,
    });
  }
  log.info("Startup pre-checks passed", { storage: storageHealth });

  // Start listening: readiness gate opens after port is bound
  const { port, host } = config.server;
  relay.http.listen(port, host, () => {
    deps.ready = true;
    log.info("Relay API started", {
      port,
      host,
      storage: blobs.name,
      variants: variants.map((v) => v.path),
    });
  });

  // Graceful shutdown with bounded timeout
  const shutdown = (): void => {
    log.info("Shutting down", { sessions: relay.sessions.size });
    deps.ready = false;
    // Force exit after 10 seconds if connections hang
    setTimeout(() => {
      log.warn("Forced shutdown after timeout");
      process.exit(1);
    }, 10_000).unref();

    relay
      .closeSessions()
      .then(() => {
        relay.http.close(() => {
          log.info("Server closed");
          process.exit(0);
        });
      })
      .catch((err: unknown) => {
        log.error("Shutdown failed", { error: describeError(err) });
        process.exit(1);
      });
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err: unknown) => {
  log.error("Fatal startup error", { error: describeError(err) });
  process.exit(1);
});
