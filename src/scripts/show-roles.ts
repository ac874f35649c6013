import { getConfig } from "../config";
import { listRoles } from "../catalog";
import { countQuestionsByCategory } from "../questions";
import { InterviewPrepService } from "../service";

const service = new InterviewPrepService(getConfig(), { tagger: null });
const questions = service.questions();

console.table(
  listRoles(service.roles()).map((role) => ({
    role,
    ...countQuestionsByCategory(role, questions),
  })),
);
