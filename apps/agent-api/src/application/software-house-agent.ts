import type {
  ClientCommunicationRequest,
  CodeDocumentationRequest,
  DeploymentGuideRequest,
  DevelopmentEstimate,
  DevelopmentEstimateRequest,
  InterviewQuestionsRequest,
  ProjectProposalRequest,
  StatusReportRequest,
  TechnicalSpecRequest,
  TestCasesRequest,
} from "@promptsmith/contracts";
import { parseEstimateResponse } from "@promptsmith/extractor";
import type { PromptClient } from "../orchestrator/prompt-client.js";

export class SoftwareHouseAgent {
  constructor(private readonly client: PromptClient) {}

  async generateTechnicalSpec(req: TechnicalSpecRequest): Promise<string> {
    return this.client.run("technical_spec", {
      project_type: req.projectType,
      requirements: req.requirements,
      tech_stack: req.techStack ?? "",
    });
  }

  async createProjectProposal(req: ProjectProposalRequest): Promise<string> {
    return this.client.run("project_proposal", {
      client_name: req.clientName,
      project_scope: req.projectScope,
      budget_range: req.budgetRange,
    });
  }

  async generateCodeDocumentation(req: CodeDocumentationRequest): Promise<string> {
    return this.client.run("code_documentation", {
      code_snippet: req.codeSnippet,
      language: req.language,
      purpose: req.purpose,
    });
  }

  async createClientCommunication(req: ClientCommunicationRequest): Promise<string> {
    return this.client.run("client_communication", {
      situation: req.situation,
      client_type: req.clientType,
      tone: req.tone,
    });
  }

  async generateTestCases(req: TestCasesRequest): Promise<string> {
    return this.client.run("test_cases", {
      feature_description: req.featureDescription,
      testing_type: req.testingType,
    });
  }

  async createDevelopmentEstimate(req: DevelopmentEstimateRequest): Promise<DevelopmentEstimate> {
    const response = await this.client.run("development_estimate", {
      task_description: req.taskDescription,
      complexity_level: req.complexityLevel,
      team_size: req.teamSize,
    });
    return parseEstimateResponse(response);
  }

  async generateDeploymentGuide(req: DeploymentGuideRequest): Promise<string> {
    return this.client.run("deployment_guide", {
      project_name: req.projectName,
      environment: req.environment,
      tech_stack: req.techStack,
    });
  }

  async createProjectStatusReport(req: StatusReportRequest): Promise<string> {
    return this.client.run("project_status_report", {
      project_name: req.projectName,
      current_status: req.currentStatus,
      milestones: req.milestones,
    });
  }

  async generateTechnicalInterviewQuestions(req: InterviewQuestionsRequest): Promise<string> {
    return this.client.run("technical_interview_questions", {
      position: req.position,
      skill_level: req.skillLevel,
      focus_areas: req.focusAreas,
    });
  }
}
