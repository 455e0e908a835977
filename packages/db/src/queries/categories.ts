import { executeQuery } from "../query";
import { readRequiredInteger, readString, toRows } from "../rows";
import type { CategoryRecord, DbClient, SkillLevelRecord } from "../types";

const TABLE = "categoria";

export async function listCategories(db: DbClient): Promise<CategoryRecord[]> {
  const data = await executeQuery({
    message: "Unable to list categories.",
    context: { table: TABLE },
    run: () => db.from(TABLE).select("id,nombre,icono").order("nombre", { ascending: true }),
  });

  return toRows(data, TABLE).map((row) => ({
    id: readRequiredInteger(row, "id", TABLE),
    name: readString(row, "nombre") ?? "",
    icon: readString(row, "icono") ?? "",
  }));
}

export async function listSkillLevels(db: DbClient): Promise<SkillLevelRecord[]> {
  const data = await executeQuery({
    message: "Unable to list skill levels.",
    context: { table: "niveles_habilidad" },
    run: () => db.from("niveles_habilidad").select("id,nombre").order("id", { ascending: true }),
  });

  return toRows(data, "niveles_habilidad").map((row) => ({
    id: readRequiredInteger(row, "id", "niveles_habilidad"),
    name: readString(row, "nombre") ?? "",
  }));
}
