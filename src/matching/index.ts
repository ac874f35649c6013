import Fuse from "fuse.js";
import { toTitleCase } from "../skills";
import type {
  JobRoleRecord,
  MatchLevel,
  MatchRecommendation,
  MatchReport,
} from "../types";

function emptyReport(): MatchReport {
  return { matchedSkills: [], missingSkills: [], matchScore: 0 };
}

function uniqueSorted(values: string[]): string[] {
  return [...new Set(values)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function normalizeRequiredSkills(requiredSkills: readonly string[]): string[] {
  return requiredSkills
    .flatMap((entry) => entry.split(","))
    .map((skill) => skill.trim().toLowerCase())
    .filter((skill) => skill.length > 0);
}

/**
 * Matches a role's required skills against a candidate's skills.
 * A requirement counts as met when either string contains the other, so
 * "react" is met by "react native" and, less helpfully, "go" by "mongodb".
 */
export function matchRoleSkills(
  requiredSkills: readonly string[],
  candidateSkills: Iterable<string>,
): MatchReport {
  const required = normalizeRequiredSkills(requiredSkills);
  if (required.length === 0) return emptyReport();

  const candidates = [...candidateSkills]
    .map((skill) => skill.trim().toLowerCase())
    .filter((skill) => skill.length > 0);

  const matched: string[] = [];
  const missing: string[] = [];

  for (const req of required) {
    const hit = candidates.some(
      (candidate) => candidate.includes(req) || req.includes(candidate),
    );
    (hit ? matched : missing).push(toTitleCase(req));
  }

  const matchScore =
    Math.round((matched.length / required.length) * 100 * 100) / 100;

  return {
    matchedSkills: uniqueSorted(matched),
    missingSkills: uniqueSorted(missing),
    matchScore,
  };
}

// Role lookup

export function findRole(
  roleName: string,
  roles: readonly JobRoleRecord[],
): JobRoleRecord | undefined {
  return roles.find((role) => role.roleName === roleName);
}

export function matchRole(
  roleName: string,
  candidateSkills: Iterable<string>,
  roles: readonly JobRoleRecord[],
): MatchReport {
  const role = findRole(roleName, roles);
  if (!role) return emptyReport();
  return matchRoleSkills(role.requiredSkills, candidateSkills);
}

export function suggestRoles(
  roleName: string,
  roles: readonly JobRoleRecord[],
  limit = 3,
): string[] {
  if (!roleName.trim() || roles.length === 0) return [];

  const fuse = new Fuse([...roles], {
    keys: ["roleName"],
    threshold: 0.4,
    ignoreLocation: true,
  });

  return fuse
    .search(roleName.trim(), { limit })
    .map((result) => result.item.roleName);
}

// Recommendation

const RECOMMENDATIONS: Record<MatchLevel, string> = {
  low: "Your resume has a low match score. Consider adding more relevant skills.",
  moderate:
    "Your resume has a moderate match score. Adding a few more skills could improve it.",
  high: "Your resume has a high match score! You're well-aligned with the role requirements.",
};

export function recommendMatch(matchScore: number): MatchRecommendation {
  const level: MatchLevel =
    matchScore < 50 ? "low" : matchScore < 75 ? "moderate" : "high";
  return { level, message: RECOMMENDATIONS[level] };
}
