import type { FastifyInstance } from "fastify";
import {
  ClientCommunicationRequestSchema,
  CodeDocumentationRequestSchema,
  DeploymentGuideRequestSchema,
  DevelopmentEstimateRequestSchema,
  InterviewQuestionsRequestSchema,
  ProjectProposalRequestSchema,
  StatusReportRequestSchema,
  TechnicalSpecRequestSchema,
  TestCasesRequestSchema,
} from "@promptsmith/contracts";
import type { Services } from "../../services.js";
import { jsonHandler } from "../http.js";

export async function registerSoftwareHouseRoutes(
  app: FastifyInstance,
  services: Services,
): Promise<void> {
  const agent = services.softwareHouseAgent;
  const respond = async (text: Promise<string>) => ({ response: await text });

  app.post(
    "/software-house/estimate",
    jsonHandler(DevelopmentEstimateRequestSchema, (body) => agent.createDevelopmentEstimate(body)),
  );

  app.post(
    "/software-house/technical-spec",
    jsonHandler(TechnicalSpecRequestSchema, (body) => respond(agent.generateTechnicalSpec(body))),
  );

  app.post(
    "/software-house/project-proposal",
    jsonHandler(ProjectProposalRequestSchema, (body) => respond(agent.createProjectProposal(body))),
  );

  app.post(
    "/software-house/code-documentation",
    jsonHandler(CodeDocumentationRequestSchema, (body) =>
      respond(agent.generateCodeDocumentation(body)),
    ),
  );

  app.post(
    "/software-house/client-communication",
    jsonHandler(ClientCommunicationRequestSchema, (body) =>
      respond(agent.createClientCommunication(body)),
    ),
  );

  app.post(
    "/software-house/test-cases",
    jsonHandler(TestCasesRequestSchema, (body) => respond(agent.generateTestCases(body))),
  );

  app.post(
    "/software-house/deployment-guide",
    jsonHandler(DeploymentGuideRequestSchema, (body) =>
      respond(agent.generateDeploymentGuide(body)),
    ),
  );

  app.post(
    "/software-house/status-report",
    jsonHandler(StatusReportRequestSchema, (body) =>
      respond(agent.createProjectStatusReport(body)),
    ),
  );

  app.post(
    "/software-house/interview-questions",
    jsonHandler(InterviewQuestionsRequestSchema, (body) =>
      respond(agent.generateTechnicalInterviewQuestions(body)),
    ),
  );
}
