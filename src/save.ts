import { writeFile, mkdir } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import Papa from "papaparse";
import { Employee } from "./types";

export async function saveJson(data: unknown, path: string) {
  const target = resolve(path);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, JSON.stringify(data, null, 2), "utf-8");
  return target;
}

export async function saveCsv(rows: Employee[], path: string) {
  const target = resolve(path);
  await mkdir(dirname(target), { recursive: true });

  const csv = Papa.unparse(
    {
      fields: ["name", "profile_url", "snippet", "inferred_emails"],
      data: rows.map((r) => [r.name, r.profile_url, r.snippet, r.inferred_emails.join(";")]),
    },
    { quotes: true }
  );

  await writeFile(target, csv, "utf-8");
  return target;
}
