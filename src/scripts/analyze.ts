import { readFileSync, writeFileSync } from "fs";
import { basename, resolve } from "path";
import { logger } from "../logger";
import { getConfig } from "../config";
import { buildQuestionExport } from "../analysis";
import { extractDocumentText } from "../documents";
import { suggestRoles } from "../matching";
import { InterviewPrepService } from "../service";
import { QUESTION_CATEGORIES } from "../types";

const args = process.argv.slice(2);

function option(name: string): string | undefined {
  const index = args.indexOf(name);
  return index >= 0 ? args[index + 1] : undefined;
}

function usage(): never {
  logger.error(
    "Usage: npm run analyze -- --resume <file> --role <name> [--top N] [--export <file.csv>]",
  );
  process.exit(1);
}

async function main() {
  const resumePath = option("--resume");
  const role = option("--role");
  const topRaw = option("--top");
  const exportPath = option("--export");

  if (!resumePath || !role) usage();

  const topN = topRaw ? Number.parseInt(topRaw, 10) : undefined;
  if (topN !== undefined && (Number.isNaN(topN) || topN < 1)) usage();

  const config = getConfig();
  const service = new InterviewPrepService(config);

  const { text, format } = await extractDocumentText({
    data: readFileSync(resolve(resumePath)),
    filename: basename(resumePath),
  });
  logger.info(`Resume loaded: ${text.length} chars (${format})`);

  const analysis = service.analyze({ resumeText: text, role, topN });

  logger.info("═══════════════════════════════════════════════════");
  logger.info(`  Analysis — ${analysis.role}`);
  logger.info("═══════════════════════════════════════════════════");
  logger.info(
    `  Skills (${analysis.skills.length}): ${analysis.skills.join(", ") || "none detected"}`,
  );

  if (!analysis.roleFound) {
    const suggestions = suggestRoles(role, service.roles());
    logger.warn(
      `  Role not in catalog${suggestions.length > 0 ? ` — did you mean: ${suggestions.join(", ")}?` : ""}`,
    );
  }

  logger.info(`  Match score: ${analysis.match.matchScore.toFixed(1)}%`);
  logger.info(`  Matched: ${analysis.match.matchedSkills.join(", ") || "none"}`);
  logger.info(`  Missing: ${analysis.match.missingSkills.join(", ") || "none"}`);
  logger.info(`  ${analysis.recommendation.message}`);

  for (const category of QUESTION_CATEGORIES) {
    const questions = analysis.questions[category];
    logger.info("");
    logger.info(`  ${category} (${questions.length})`);
    questions.forEach((q, i) => {
      logger.info(`    Q${i + 1} [${q.difficulty}] ${q.text}`);
    });
  }

  if (exportPath) {
    writeFileSync(resolve(exportPath), buildQuestionExport(analysis) + "\n", "utf-8");
    logger.info(`Questions exported to ${exportPath}`);
  }

  process.exit(0);
}

main().catch((error) => {
  logger.error(`Analysis failed: ${error}`);
  process.exit(1);
});
