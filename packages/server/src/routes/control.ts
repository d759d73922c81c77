import type { BoardService } from "../board/boardService.js";
import type { BoardClient } from "../board/connectionRegistry.js";
import { json, type RouteResult } from "../http.js";

const DURABILITY_FAILURE = {
  ok: false,
  error: "durability_failure",
  message: "The change was applied and broadcast but could not be saved",
} as const;

/** `DELETE /:pass/api/msg/:id` */
export async function handleDeleteMessage<C extends BoardClient>(
  board: BoardService<C>,
  pass: string,
  id: string,
): Promise<RouteResult> {
  const result = await board.deleteMessage(pass, id);
  if (!result.ok) return json({ error: "forbidden" }, 403);
  if (!result.durable) return json(DURABILITY_FAILURE, 500);
  return json({ ok: true, deleted: result.deleted, files_deleted: result.filesDeleted });
}

/** `POST /:pass/api/clear` */
export async function handleClearBoard<C extends BoardClient>(
  board: BoardService<C>,
  pass: string,
): Promise<RouteResult> {
  const result = await board.clearBoard(pass);
  if (!result.ok) return json({ error: "forbidden" }, 403);
  if (!result.durable) return json(DURABILITY_FAILURE, 500);
  return json({ ok: true, files_deleted: result.filesDeleted });
}
