/**
 * Knowledge Loader: the published FOI response library and the team directory,
 * read from CSV files with a header row.
 */

import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { KnowledgeSourceError, errorMessage } from "@foi-mailroom/shared/Types/errors.js";
import type { HistoricalResponseRecord, TeamDirectory } from "../types/foi.js";

export const DEFAULT_LIBRARY_LIMIT = 50;

export const LIBRARY_COLUMNS = ["Identifier", "Document Title", "Document Text", "Document Link"] as const;
export const TEAM_COLUMNS = ["team", "officer_email"] as const;

const RowsSchema = z.array(z.record(z.string(), z.string()));

type Row = Record<string, string>;

async function readCsv(path: string, required: readonly string[]): Promise<Row[]> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new KnowledgeSourceError(`Cannot read ${path}: ${errorMessage(error)}`, { path });
  }

  let header: string[] = [];
  let records: unknown;
  try {
    records = parse(content, {
      bom: true,
      skip_empty_lines: true,
      columns: (names: string[]) => {
        header = names;
        return names;
      },
    });
  } catch (error) {
    throw new KnowledgeSourceError(`Malformed CSV in ${path}: ${errorMessage(error)}`, { path });
  }

  const missing = required.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new KnowledgeSourceError(`${path} is missing required columns: ${missing.join(", ")}`, {
      path,
      missing,
    });
  }

  const rows = RowsSchema.safeParse(records);
  if (!rows.success) {
    throw new KnowledgeSourceError(`Malformed CSV in ${path}: ${rows.error.message}`, { path });
  }
  return rows.data;
}

function column(row: Row, name: string): string {
  return row[name] ?? "";
}

/**
 * At most `limit` records, in file order
 */
export async function loadLibrary(
  path: string,
  limit: number = DEFAULT_LIBRARY_LIMIT
): Promise<HistoricalResponseRecord[]> {
  const rows = await readCsv(path, LIBRARY_COLUMNS);
  return rows.slice(0, limit).map((row) => ({
    identifier: column(row, "Identifier"),
    title: column(row, "Document Title"),
    text: column(row, "Document Text"),
    link: column(row, "Document Link"),
  }));
}

/**
 * A team listed twice keeps its last address
 */
export async function loadTeamDirectory(path: string): Promise<TeamDirectory> {
  const rows = await readCsv(path, TEAM_COLUMNS);
  const teams: TeamDirectory = new Map();
  for (const row of rows) {
    teams.set(column(row, "team"), column(row, "officer_email"));
  }
  return teams;
}

export function formatLibrary(records: readonly HistoricalResponseRecord[]): string {
  return records
    .map((r) => `ID: ${r.identifier}\nTitle: ${r.title}\nText: ${r.text}\nLink: ${r.link}`)
    .join("\n\n---\n\n");
}

export interface KnowledgeSource {
  loadLibrary(): Promise<HistoricalResponseRecord[]>;
  loadTeamDirectory(): Promise<TeamDirectory>;
}

export interface CsvKnowledgeOptions {
  libraryPath: string;
  teamsPath: string;
  libraryLimit?: number;
}

/**
 * Reads both files again on every call
 */
export function createCsvKnowledgeSource(options: CsvKnowledgeOptions): KnowledgeSource {
  return {
    loadLibrary: () => loadLibrary(options.libraryPath, options.libraryLimit),
    loadTeamDirectory: () => loadTeamDirectory(options.teamsPath),
  };
}
