import { describe, expect, it } from "vitest";
import type { JobRoleRecord } from "../types";
import {
  findRole,
  matchRole,
  matchRoleSkills,
  normalizeRequiredSkills,
  recommendMatch,
  suggestRoles,
} from "./index";

const roles: JobRoleRecord[] = [
  { roleName: "Backend Developer", requiredSkills: ["Python", "SQL", "Docker"] },
  { roleName: "Frontend Developer", requiredSkills: ["JavaScript", "React", "CSS"] },
  { roleName: "Data Scientist", requiredSkills: ["Python", "Pandas"] },
];

describe("matchRoleSkills", () => {
  it("scores zero with empty sets when nothing is required", () => {
    expect(matchRoleSkills([], ["python", "java"])).toEqual({
      matchedSkills: [],
      missingSkills: [],
      matchScore: 0,
    });
  });

  it("splits matched and missing skills", () => {
    expect(matchRoleSkills(["Python", "SQL"], ["python", "java"])).toEqual({
      matchedSkills: ["Python"],
      missingSkills: ["Sql"],
      matchScore: 50,
    });
  });

  it("accepts containment in either direction", () => {
    expect(matchRoleSkills(["react"], ["React Native"]).matchedSkills).toEqual(["React"]);
    expect(matchRoleSkills(["react native"], ["React"]).matchedSkills).toEqual([
      "React Native",
    ]);
  });

  it("keeps the short-skill false positive", () => {
    expect(matchRoleSkills(["go"], ["Mongodb"])).toEqual({
      matchedSkills: ["Go"],
      missingSkills: [],
      matchScore: 100,
    });
  });

  it("splits comma-joined entries and rounds to two decimals", () => {
    expect(matchRoleSkills(["Python, SQL , Docker"], ["docker"])).toEqual({
      matchedSkills: ["Docker"],
      missingSkills: ["Python", "Sql"],
      matchScore: 33.33,
    });
  });

  it("counts duplicate requirements but reports them once", () => {
    expect(matchRoleSkills(["python", "Python"], ["python"])).toEqual({
      matchedSkills: ["Python"],
      missingSkills: [],
      matchScore: 100,
    });
  });

  it("ignores blank required tokens", () => {
    expect(normalizeRequiredSkills(["python,,", " "])).toEqual(["python"]);
    expect(matchRoleSkills(["python,,"], ["java"]).matchScore).toBe(0);
  });

  it("marks everything missing when the candidate has no skills", () => {
    expect(matchRoleSkills(["Python", "Docker"], [])).toEqual({
      matchedSkills: [],
      missingSkills: ["Docker", "Python"],
      matchScore: 0,
    });
  });

  it("never reports a skill as both matched and missing", () => {
    const report = matchRoleSkills(
      ["Python", "Go", "SQL", "React Native", "AWS"],
      ["mongodb", "react", "python"],
    );
    const matched = new Set(report.matchedSkills);
    expect(report.missingSkills.filter((s) => matched.has(s))).toEqual([]);
    expect(report.matchedSkills.length + report.missingSkills.length).toBe(5);
  });

  it("is idempotent", () => {
    const args = [["Python", "SQL"], ["python"]] as const;
    expect(matchRoleSkills(...args)).toEqual(matchRoleSkills(...args));
  });
});

describe("matchRole", () => {
  it("matches against the role's requirements", () => {
    expect(matchRole("Data Scientist", ["Python"], roles)).toEqual({
      matchedSkills: ["Python"],
      missingSkills: ["Pandas"],
      matchScore: 50,
    });
  });

  it("returns an empty report for an unknown role", () => {
    expect(matchRole("Astronaut", ["Python"], roles)).toEqual({
      matchedSkills: [],
      missingSkills: [],
      matchScore: 0,
    });
    expect(findRole("backend developer", roles)).toBeUndefined();
  });
});

describe("suggestRoles", () => {
  it("puts the closest role name first", () => {
    expect(suggestRoles("Backend Dev", roles)[0]).toBe("Backend Developer");
  });

  it("returns nothing for a blank name", () => {
    expect(suggestRoles("  ", roles)).toEqual([]);
  });
});

describe("recommendMatch", () => {
  it("bands the score at 50 and 75", () => {
    expect(recommendMatch(49.99).level).toBe("low");
    expect(recommendMatch(50).level).toBe("moderate");
    expect(recommendMatch(74.99).level).toBe("moderate");
    expect(recommendMatch(75).level).toBe("high");
    expect(recommendMatch(10).message).toBe(
      "Your resume has a low match score. Consider adding more relevant skills.",
    );
  });
});
