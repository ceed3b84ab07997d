import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { KnowledgeSourceError } from "@foi-mailroom/shared/Types/errors.js";
import {
  createCsvKnowledgeSource,
  formatLibrary,
  loadLibrary,
  loadTeamDirectory,
} from "../../src/knowledge/loader.js";

const LIBRARY_HEADER = "Identifier,Document Title,Document Text,Document Link";

let dir: string;

async function fixture(name: string, content: string): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, content, "utf-8");
  return path;
}

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "foi-knowledge-"));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("loadLibrary", () => {
  it("returns at most 50 records from a 100-row file, in file order", async () => {
    const rows = Array.from(
      { length: 100 },
      (_, i) => `FOI-${i + 1},Title ${i + 1},Text ${i + 1},https://example.org/foi/${i + 1}`
    );
    const path = await fixture("hundred.csv", [LIBRARY_HEADER, ...rows].join("\n"));

    const records = await loadLibrary(path);

    expect(records).toHaveLength(50);
    expect(records[0]).toEqual({
      identifier: "FOI-1",
      title: "Title 1",
      text: "Text 1",
      link: "https://example.org/foi/1",
    });
    expect(records[49].identifier).toBe("FOI-50");
  });

  it("honours a smaller limit", async () => {
    const path = await fixture(
      "three.csv",
      [LIBRARY_HEADER, "A,One,x,l1", "B,Two,y,l2", "C,Three,z,l3"].join("\n")
    );

    expect((await loadLibrary(path, 2)).map((r) => r.identifier)).toEqual(["A", "B"]);
  });

  it("reads quoted fields and tolerates a byte order mark", async () => {
    const path = await fixture(
      "quoted.csv",
      `\uFEFF${LIBRARY_HEADER}\nQ1,"Costs, 2023","Line one\nLine two",https://example.org/q1\n`
    );

    expect(await loadLibrary(path)).toEqual([
      {
        identifier: "Q1",
        title: "Costs, 2023",
        text: "Line one\nLine two",
        link: "https://example.org/q1",
      },
    ]);
  });

  it("fails when a required column is missing", async () => {
    const path = await fixture("no-link.csv", "Identifier,Document Title,Document Text\nA,B,C\n");

    await expect(loadLibrary(path)).rejects.toThrow(`${path} is missing required columns: Document Link`);
  });

  it("fails when the file is empty", async () => {
    const path = await fixture("empty.csv", "");

    await expect(loadLibrary(path)).rejects.toBeInstanceOf(KnowledgeSourceError);
  });

  it("fails when the file does not exist", async () => {
    const path = join(dir, "missing.csv");

    await expect(loadLibrary(path)).rejects.toThrow(`Cannot read ${path}`);
  });

  it("fails on malformed CSV", async () => {
    const path = await fixture("broken.csv", `${LIBRARY_HEADER}\nA,"unterminated,x,y\n`);

    const error = await loadLibrary(path).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(KnowledgeSourceError);
    expect(error).toHaveProperty("message", expect.stringContaining(`Malformed CSV in ${path}`));
  });

  it("reads the library shipped with the package", async () => {
    const path = fileURLToPath(new URL("../../data/foi_responses.csv", import.meta.url));

    const records = await loadLibrary(path);

    expect(records).toHaveLength(6);
    expect(records[0].identifier).toBe("FOI-0001");
    expect(records[0].text).toContain("41,230");
  });
});

describe("loadTeamDirectory", () => {
  it("maps team names to officer addresses in file order", async () => {
    const path = await fixture(
      "teams.csv",
      "team,officer_email\nParking,parking@example.org\nHousing,housing@example.org\n"
    );

    const teams = await loadTeamDirectory(path);

    expect([...teams]).toEqual([
      ["Parking", "parking@example.org"],
      ["Housing", "housing@example.org"],
    ]);
  });

  it("keeps the last address of a repeated team", async () => {
    const path = await fixture(
      "dupes.csv",
      "team,officer_email\nParking,old@example.org\nParking,new@example.org\n"
    );

    expect((await loadTeamDirectory(path)).get("Parking")).toBe("new@example.org");
  });

  it("fails without the officer_email column", async () => {
    const path = await fixture("teams-bad.csv", "team,email\nParking,p@example.org\n");

    await expect(loadTeamDirectory(path)).rejects.toThrow(`${path} is missing required columns: officer_email`);
  });

  it("reads the directory shipped with the package", async () => {
    const path = fileURLToPath(new URL("../../data/team_contacts.csv", import.meta.url));

    const teams = await loadTeamDirectory(path);

    expect(teams.size).toBe(6);
    expect(teams.get("Housing Needs")).toBe("housing.foi@example.org");
  });
});

describe("formatLibrary", () => {
  it("renders each record and separates them", () => {
    const text = formatLibrary([
      { identifier: "A", title: "First", text: "One", link: "l1" },
      { identifier: "B", title: "Second", text: "Two", link: "l2" },
    ]);

    expect(text).toBe(
      "ID: A\nTitle: First\nText: One\nLink: l1\n\n---\n\nID: B\nTitle: Second\nText: Two\nLink: l2"
    );
  });

  it("renders an empty library as empty text", () => {
    expect(formatLibrary([])).toBe("");
  });
});

describe("createCsvKnowledgeSource", () => {
  it("rereads the files on every call", async () => {
    const libraryPath = await fixture("live.csv", `${LIBRARY_HEADER}\nA,One,x,l1\n`);
    const teamsPath = await fixture("live-teams.csv", "team,officer_email\nParking,p@example.org\n");
    const source = createCsvKnowledgeSource({ libraryPath, teamsPath, libraryLimit: 10 });

    expect(await source.loadLibrary()).toHaveLength(1);
    await writeFile(libraryPath, `${LIBRARY_HEADER}\nA,One,x,l1\nB,Two,y,l2\n`, "utf-8");
    expect(await source.loadLibrary()).toHaveLength(2);
    expect((await source.loadTeamDirectory()).get("Parking")).toBe("p@example.org");
  });
});
