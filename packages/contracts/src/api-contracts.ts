import { z } from "zod";
import { SlotValuesSchema } from "./template-schema.js";

export const RenderTemplateRequestSchema = z.object({
  slots: SlotValuesSchema.default({}),
});

export const AnalyzePromptRequestSchema = z.object({
  prompt: z.string().min(1),
  context: z.string().optional(),
});

export const OptimizePromptRequestSchema = z.object({
  originalPrompt: z.string().min(1),
  issues: z.string(),
  goal: z.string(),
});

export const ComparePromptsRequestSchema = z.object({
  promptA: z.string().min(1),
  promptB: z.string().min(1),
  testInput: z.string(),
});

export const EvaluateResponseRequestSchema = z.object({
  prompt: z.string().min(1),
  response: z.string().min(1),
  criteria: z.string(),
});

export const OptimizeContextRequestSchema = z.object({
  longPrompt: z.string().min(1),
  constraints: z.string(),
});

export const DevelopmentEstimateRequestSchema = z.object({
  taskDescription: z.string().min(1),
  complexityLevel: z.string(),
  teamSize: z.string(),
});

export const TechnicalSpecRequestSchema = z.object({
  projectType: z.string().min(1),
  requirements: z.string(),
  techStack: z.string().optional(),
});

export const ProjectProposalRequestSchema = z.object({
  clientName: z.string().min(1),
  projectScope: z.string(),
  budgetRange: z.string(),
});

export const CodeDocumentationRequestSchema = z.object({
  codeSnippet: z.string().min(1),
  language: z.string(),
  purpose: z.string(),
});

export const ClientCommunicationRequestSchema = z.object({
  situation: z.string().min(1),
  clientType: z.string(),
  tone: z.string(),
});

export const TestCasesRequestSchema = z.object({
  featureDescription: z.string().min(1),
  testingType: z.string(),
});

export const DeploymentGuideRequestSchema = z.object({
  projectName: z.string().min(1),
  environment: z.string(),
  techStack: z.string(),
});

export const StatusReportRequestSchema = z.object({
  projectName: z.string().min(1),
  currentStatus: z.string(),
  milestones: z.string(),
});

export const InterviewQuestionsRequestSchema = z.object({
  position: z.string().min(1),
  skillLevel: z.string(),
  focusAreas: z.string(),
});

export const RefinementSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("details"), text: z.string() }),
  z.object({ kind: z.literal("tone"), text: z.string() }),
  z.object({ kind: z.literal("requirements"), text: z.string() }),
  z.object({ kind: z.literal("none") }),
]);

export const PromptOptionsRequestSchema = z.object({
  details: SlotValuesSchema.default({}),
});

export const RunSessionRequestSchema = z.object({
  categoryId: z.string().min(1),
  details: SlotValuesSchema.default({}),
  prompt: z.string().min(1),
  refinement: RefinementSchema.optional(),
});

export const ErrorResponseSchema = z.object({
  error: z.string(),
  message: z.string().optional(),
  details: z.array(z.unknown()).optional(),
});

export type AnalyzePromptRequest = z.infer<typeof AnalyzePromptRequestSchema>;
export type OptimizePromptRequest = z.infer<typeof OptimizePromptRequestSchema>;
export type ComparePromptsRequest = z.infer<typeof ComparePromptsRequestSchema>;
export type EvaluateResponseRequest = z.infer<typeof EvaluateResponseRequestSchema>;
export type OptimizeContextRequest = z.infer<typeof OptimizeContextRequestSchema>;
export type DevelopmentEstimateRequest = z.infer<typeof DevelopmentEstimateRequestSchema>;
export type TechnicalSpecRequest = z.infer<typeof TechnicalSpecRequestSchema>;
export type ProjectProposalRequest = z.infer<typeof ProjectProposalRequestSchema>;
export type CodeDocumentationRequest = z.infer<typeof CodeDocumentationRequestSchema>;
export type ClientCommunicationRequest = z.infer<typeof ClientCommunicationRequestSchema>;
export type TestCasesRequest = z.infer<typeof TestCasesRequestSchema>;
export type DeploymentGuideRequest = z.infer<typeof DeploymentGuideRequestSchema>;
export type StatusReportRequest = z.infer<typeof StatusReportRequestSchema>;
export type InterviewQuestionsRequest = z.infer<typeof InterviewQuestionsRequestSchema>;
export type Refinement = z.infer<typeof RefinementSchema>;
export type RunSessionRequest = z.infer<typeof RunSessionRequestSchema>;
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
