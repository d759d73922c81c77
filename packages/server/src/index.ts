import { join } from "node:path";
import type { WebSocket } from "ws";
import { BoardService } from "./board/boardService.js";
import { ConnectionRegistry } from "./board/connectionRegistry.js";
import { HISTORY_JOURNAL_FILE } from "./board/constants.js";
import { HistoryLog } from "./board/historyLog.js";
import { BoardRateLimits } from "./board/rateLimits.js";
import { startRetentionSweeper } from "./board/retentionSweeper.js";
import type { ServerConfig } from "./config.js";
import { describeError, logEvent, type Log } from "./log.js";
import { createBoardServer } from "./server.js";
import { AttachmentStore } from "./storage/attachmentStore.js";
import { LocalDiskStorage } from "./storage/localDiskStorage.js";
import { createWsGateway } from "./transport/wsGateway.js";

export type RunningBoard = Readonly<{
  address: string;
  stop: () => Promise<void>;
}>;

export async function startBoard(config: ServerConfig, log: Log = logEvent): Promise<RunningBoard> {
  const storage = new LocalDiskStorage(config.uploadDir);
  await storage.ensureRoot();

  const history = new HistoryLog(join(config.dataDir, HISTORY_JOURNAL_FILE), {
    limit: config.board.historyLimit,
  });
  const loaded = await history.load();
  if (loaded.readError !== undefined) {
    log({ type: "history_read_failed", error: describeError(loaded.readError) });
  }
  log({ type: "history_loaded", loaded: loaded.loaded, skipped: loaded.skipped, trimmed: loaded.trimmed });

  const attachments = new AttachmentStore({ storage, log });
  const registry = new ConnectionRegistry<WebSocket>({
    sendTimeoutMs: config.transport.sendTimeoutMs,
    maxBufferedBytes: config.transport.maxBufferedBytes,
    log,
  });
  const board = new BoardService<WebSocket>({
    passphrase: config.passphrase,
    history,
    attachments,
    registry,
    attachmentPolicy: { maxAttachmentBytes: config.board.maxAttachmentBytes },
    log,
  });
  const rateLimits = new BoardRateLimits(config.board);

  const gateway = createWsGateway({ board, rateLimits, transport: config.transport, log });
  const publicAddress = `${config.host}:${config.port}`;
  const server = createBoardServer({
    board,
    attachments,
    rateLimits,
    uploadRoot: storage.root,
    maxAttachmentBytes: config.board.maxAttachmentBytes,
    publicAddress,
    gateway,
    log,
  });

  const sweeper = startRetentionSweeper({
    sweep: () => attachments.sweepExpired(config.retention.maxAgeSeconds),
    intervalMs: config.retention.intervalMs,
    log,
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, config.host, () => {
      server.off("error", reject);
      resolve();
    });
  });
  log({ type: "server_listening", host: config.host, port: config.port });

  const stop = async () => {
    sweeper.stop();
    await gateway.close();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
    log({ type: "server_stopped" });
  };

  return { address: publicAddress, stop };
}

export { parseServerConfig, readServerConfig, type ServerConfig } from "./config.js";
