import { mkdtempSync, rmSync, utimesSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  CatalogCache,
  listRoles,
  loadJobRoles,
  parseCsv,
  parseJobRoles,
  parseQuestions,
  toCsv,
} from "./index";

describe("parseCsv", () => {
  it("handles quoted commas, doubled quotes, CRLF and blank lines", () => {
    expect(parseCsv('a,b\n"x, y","he said ""hi"""\r\n\n1,2')).toEqual([
      ["a", "b"],
      ["x, y", 'he said "hi"'],
      ["1", "2"],
    ]);
  });

  it("keeps line breaks inside quoted fields", () => {
    expect(parseCsv('q\n"line one\nline two"\n')).toEqual([["q"], ["line one\nline two"]]);
  });

  it("keeps empty trailing fields", () => {
    expect(parseCsv("a,b\nx,")).toEqual([
      ["a", "b"],
      ["x", ""],
    ]);
  });
});

describe("toCsv", () => {
  it("quotes every field and doubles quotes", () => {
    expect(toCsv(["A", "B"], [['say "hi"', 3]])).toBe('"A","B"\n"say ""hi""","3"');
  });
});

describe("parseJobRoles", () => {
  it("splits key skills and skips incomplete or overlong rows", () => {
    const csv = [
      "Job_Role,Key_Skills",
      'Backend Developer,"Python, SQL ,Docker"',
      "Tester,",
      "Broken,a,b",
      ",Python",
      "Analyst,Excel",
    ].join("\n");

    expect(parseJobRoles(csv)).toEqual([
      { roleName: "Backend Developer", requiredSkills: ["Python", "SQL", "Docker"] },
      { roleName: "Analyst", requiredSkills: ["Excel"] },
    ]);
  });

  it("returns nothing for an empty file", () => {
    expect(parseJobRoles("")).toEqual([]);
  });
});

describe("parseQuestions", () => {
  it("defaults difficulty and drops unknown categories", () => {
    const csv = [
      "Job_Role,Question_Type,Question,Difficulty",
      "Backend Developer,Technical,What is REST?,Easy",
      "Backend Developer,Behavioral,Tell me about a conflict.,",
      "Backend Developer,Trivia,Favourite colour?,Easy",
      "Backend Developer,Technical,,Hard",
    ].join("\n");

    expect(parseQuestions(csv)).toEqual([
      {
        roleName: "Backend Developer",
        category: "Technical",
        text: "What is REST?",
        storedDifficulty: "Easy",
      },
      {
        roleName: "Backend Developer",
        category: "Behavioral",
        text: "Tell me about a conflict.",
        storedDifficulty: "Medium",
      },
    ]);
  });

  it("defaults difficulty when the column is absent", () => {
    const csv = "Job_Role,Question_Type,Question\nQA,Scenario-based,A build breaks. What now?";
    expect(parseQuestions(csv)[0].storedDifficulty).toBe("Medium");
  });
});

describe("listRoles", () => {
  it("keeps first-seen order without duplicates", () => {
    expect(
      listRoles([
        { roleName: "B", requiredSkills: [] },
        { roleName: "A", requiredSkills: [] },
        { roleName: "B", requiredSkills: ["x"] },
      ]),
    ).toEqual(["B", "A"]);
  });
});

describe("loading from disk", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "catalog-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns an empty catalog for a missing file", () => {
    expect(loadJobRoles(join(dir, "missing.csv"))).toEqual([]);
  });

  it("caches by modification time", () => {
    const path = join(dir, "roles.csv");
    writeFileSync(path, "Job_Role,Key_Skills\nAnalyst,Excel\n");
    utimesSync(path, new Date(2026, 0, 1), new Date(2026, 0, 1));

    const cache = new CatalogCache();
    const first = cache.jobRoles(path);
    expect(cache.jobRoles(path)).toBe(first);

    writeFileSync(path, "Job_Role,Key_Skills\nAnalyst,Excel\nTester,Selenium\n");
    utimesSync(path, new Date(2026, 0, 2), new Date(2026, 0, 2));

    const second = cache.jobRoles(path);
    expect(second).not.toBe(first);
    expect(listRoles(second)).toEqual(["Analyst", "Tester"]);
  });

  it("reloads after invalidation", () => {
    const path = join(dir, "questions.csv");
    writeFileSync(path, "Job_Role,Question_Type,Question\nQA,Technical,What is a test?\n");

    const cache = new CatalogCache();
    const first = cache.questions(path);
    expect(cache.size).toBe(1);

    cache.invalidate(path);
    expect(cache.size).toBe(0);
    const second = cache.questions(path);
    expect(second).not.toBe(first);
    expect(second).toEqual(first);
  });
});
