import { promises as fs } from "fs";
import path from "path";
import type * as pg from "pg";

export async function applySqlFile(pool: pg.Pool, filePath: string): Promise<void> {
  const sql = await fs.readFile(path.resolve(filePath), "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}
