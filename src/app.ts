import { Hono, type Context } from "hono";
import { z } from "zod";
import { logger } from "./logger";
import { buildQuestionExport, exportFileName, type AnalysisInput } from "./analysis";
import { listRoles } from "./catalog";
import { classifyDifficulty } from "./difficulty";
import { DocumentError, extractDocumentText } from "./documents";
import { findRole, matchRoleSkills, suggestRoles } from "./matching";
import { countQuestionsByCategory, selectQuestionRecords } from "./questions";
import type { InterviewPrepService } from "./service";
import type { AppConfig } from "./config";
import { isQuestionCategory, QUESTION_CATEGORIES } from "./types";

const VERSION = "1.0.0";

const skillsBody = z.object({
  text: z.string(),
});

const matchBody = z.object({
  role: z.string().min(1),
  skills: z.array(z.string()),
});

const analyzeBody = z.object({
  resumeText: z.string(),
  role: z.string().min(1),
  topN: z.coerce.number().int().min(1).max(50).optional(),
});

class RequestError extends Error {
  constructor(
    readonly status: 400 | 415 | 422,
    message: string,
    readonly issues?: string[],
  ) {
    super(message);
    this.name = "RequestError";
  }
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new RequestError(
      400,
      "Invalid request body",
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "(body)"}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}

async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    throw new RequestError(400, "Request body must be valid JSON");
  }
}

/** Accepts JSON `{ resumeText, role, topN }` or multipart with a `resume` file. */
async function readAnalyzeInput(c: Context): Promise<AnalysisInput> {
  const contentType = c.req.header("content-type") ?? "";
  if (!contentType.includes("multipart/form-data")) {
    return validate(analyzeBody, await readJson(c));
  }

  const body = await c.req.parseBody();
  const file = body.resume;
  if (!(file instanceof File)) {
    throw new RequestError(400, "Multipart requests need a `resume` file field");
  }

  try {
    const document = await extractDocumentText({
      data: new Uint8Array(await file.arrayBuffer()),
      filename: file.name,
      mimeType: file.type,
    });
    return validate(analyzeBody, {
      resumeText: document.text,
      role: typeof body.role === "string" ? body.role : "",
      topN: typeof body.topN === "string" && body.topN !== "" ? body.topN : undefined,
    });
  } catch (error) {
    if (error instanceof DocumentError) {
      throw new RequestError(
        error.code === "unsupported_format" ? 415 : 422,
        error.message,
      );
    }
    throw error;
  }
}

export function createApp(service: InterviewPrepService, config: AppConfig): Hono {
  const app = new Hono();

  app.onError((error, c) => {
    if (error instanceof RequestError) {
      return c.json(
        { error: error.message, ...(error.issues ? { issues: error.issues } : {}) },
        error.status,
      );
    }
    logger.error(`Unhandled error on ${c.req.method} ${c.req.path}:`, error);
    return c.json({ error: "Internal error" }, 500);
  });

  app.get("/health", (c) => {
    const roles = service.roles();
    const questions = service.questions();

    return c.json({
      status: roles.length > 0 && questions.length > 0 ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      version: VERSION,
      environment: config.env.nodeEnv,
      posTagger: service.tagger !== null,
      catalog: {
        roles: roles.length,
        questions: questions.length,
        vocabulary: service.vocabulary.entries.length,
      },
    });
  });

  app.get("/api/roles", (c) => {
    const roles = service.roles();
    const questions = service.questions();

    return c.json({
      count: roles.length,
      roles: listRoles(roles).map((roleName) => ({
        roleName,
        requiredSkills: findRole(roleName, roles)?.requiredSkills ?? [],
        questionCounts: countQuestionsByCategory(roleName, questions),
      })),
    });
  });

  app.get("/api/roles/:role/questions", (c) => {
    const role = c.req.param("role");
    const category = c.req.query("category") ?? "Technical";

    if (!isQuestionCategory(category)) {
      throw new RequestError(
        400,
        `Unknown category "${category}". Use one of: ${QUESTION_CATEGORIES.join(", ")}`,
      );
    }

    const questions = selectQuestionRecords(role, category, service.questions()).map(
      (q) => ({
        text: q.text,
        difficulty: classifyDifficulty(q.text, config.difficulty),
        storedDifficulty: q.storedDifficulty,
      }),
    );

    return c.json({ role, category, count: questions.length, questions });
  });

  app.post("/api/skills", async (c) => {
    const { text } = validate(skillsBody, await readJson(c));
    const skills = service.extractSkills(text);
    return c.json({ count: skills.length, skills });
  });

  app.post("/api/match", async (c) => {
    const { role, skills } = validate(matchBody, await readJson(c));
    const roles = service.roles();
    const record = findRole(role, roles);
    const report = matchRoleSkills(record?.requiredSkills ?? [], skills);

    return c.json({
      role,
      roleFound: record !== undefined,
      ...report,
      ...(record ? {} : { suggestions: suggestRoles(role, roles) }),
    });
  });

  app.post("/api/analyze", async (c) => {
    const input = await readAnalyzeInput(c);
    const analysis = service.analyze(input);

    if (!analysis.roleFound) {
      return c.json({ ...analysis, suggestions: suggestRoles(input.role, service.roles()) });
    }
    return c.json(analysis);
  });

  app.post("/api/analyze/export", async (c) => {
    const input = await readAnalyzeInput(c);
    const analysis = service.analyze(input);
    const filename = exportFileName(analysis.role);

    c.header("Content-Type", "text/csv; charset=utf-8");
    c.header("Content-Disposition", `attachment; filename="${filename}"`);
    return c.body(buildQuestionExport(analysis));
  });

  return app;
}
