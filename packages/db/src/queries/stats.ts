import { executeCountQuery, executeQuery } from "../query";
import { readInteger, toEstado, toRows } from "../rows";
import type { DbClient } from "../types";

export type AppStats = {
  users: number;
  categories: number;
  upcoming_events: number;
};

/** Headline numbers for the landing page. */
export async function loadAppStats(db: DbClient, now: Date): Promise<AppStats> {
  const [users, categories, upcomingEvents] = await Promise.all([
    executeCountQuery({
      message: "Unable to count users.",
      context: { table: "usuarios" },
      run: () => db.from("usuarios").select("id", { count: "exact", head: true }),
    }),
    countEventCategories(db),
    executeCountQuery({
      message: "Unable to count upcoming events.",
      context: { table: "eventos" },
      run: () =>
        db
          .from("eventos")
          .select("id", { count: "exact", head: true })
          .neq("estado", toEstado("cancelled"))
          .gte("inicio", now.toISOString()),
    }),
  ]);

  return { users, categories, upcoming_events: upcomingEvents };
}

/** Distinct categories that have at least one event. */
async function countEventCategories(db: DbClient): Promise<number> {
  const data = await executeQuery({
    message: "Unable to list event categories.",
    context: { table: "eventos" },
    run: () => db.from("eventos").select("categoria"),
  });

  const categories = new Set<number>();
  for (const row of toRows(data, "eventos")) {
    const category = readInteger(row, "categoria");
    if (category !== null) {
      categories.add(category);
    }
  }
  return categories.size;
}
