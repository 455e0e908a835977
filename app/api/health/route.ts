import { jsonResponse } from "../../lib/http";

export async function GET(): Promise<Response> {
  return jsonResponse({ ok: true });
}
