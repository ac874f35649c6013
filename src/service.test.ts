import { mkdtempSync, rmSync, utimesSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "./config";
import { InterviewPrepService } from "./service";

describe("InterviewPrepService", () => {
  let dir: string;
  const stamp = new Date(2026, 0, 1);

  const writeRoles = (body: string) => {
    const path = join(dir, "job_roles.csv");
    writeFileSync(path, body);
    utimesSync(path, stamp, stamp);
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "service-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads catalogs from the data directory and reloads on request", () => {
    writeRoles("Job_Role,Key_Skills\nAnalyst,Excel\n");
    const service = new InterviewPrepService(loadConfig({ DATA_DIR: dir }), { tagger: null });
    expect(service.roles().map((r) => r.roleName)).toEqual(["Analyst"]);
    expect(service.questions()).toEqual([]);

    writeRoles("Job_Role,Key_Skills\nTester,Selenium\n");
    expect(service.roles().map((r) => r.roleName)).toEqual(["Analyst"]);

    service.reloadCatalogs();
    expect(service.roles().map((r) => r.roleName)).toEqual(["Tester"]);
  });

  it("extracts soft skills only when enabled", () => {
    const text = "Leadership and Python";
    const plain = new InterviewPrepService(loadConfig({ DATA_DIR: dir }), { tagger: null });
    const soft = new InterviewPrepService(
      loadConfig({ DATA_DIR: dir, INCLUDE_SOFT_SKILLS: "true" }),
      { tagger: null },
    );
    expect(plain.extractSkills(text)).toEqual(["Python"]);
    expect(soft.extractSkills(text)).toEqual(["Leadership", "Python"]);
  });
});
