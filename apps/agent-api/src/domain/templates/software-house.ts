import type { TemplateDefinitionInput } from "@promptsmith/contracts";

export const TECHNICAL_SPEC: TemplateDefinitionInput = {
  name: "technical_spec",
  description: "Client-ready technical specification for a project.",
  slots: ["project_type", "requirements", "tech_stack"],
  body: `As a senior software architect, create a comprehensive technical specification for a {{project_type}} project.

Client Requirements: {{requirements}}
Preferred Tech Stack: {{tech_stack}}

Please provide:
1. System Architecture Overview
2. Database Design
3. API Specifications
4. Security Considerations
5. Performance Requirements
6. Deployment Strategy
7. Timeline Estimation
8. Resource Requirements

Format the response in a professional, client-ready document structure.`,
};

export const PROJECT_PROPOSAL: TemplateDefinitionInput = {
  name: "project_proposal",
  description: "Project proposal tailored to a client and budget.",
  slots: ["client_name", "project_scope", "budget_range"],
  body: `Create a professional project proposal for {{client_name}}.

Project Scope: {{project_scope}}
Budget Range: {{budget_range}}

Include:
1. Executive Summary
2. Project Overview
3. Technical Approach
4. Deliverables
5. Timeline & Milestones
6. Team Structure
7. Pricing Breakdown
8. Risk Mitigation
9. Next Steps

Make it compelling, professional, and tailored to win the project.`,
};

export const CODE_DOCUMENTATION: TemplateDefinitionInput = {
  name: "code_documentation",
  description: "Team documentation for a code snippet.",
  slots: ["code_snippet", "language", "purpose"],
  body: `Generate professional documentation for this {{language}} code:

Code:
{{code_snippet}}

Purpose: {{purpose}}

Please provide:
1. Function/Class Overview
2. Parameters & Return Values
3. Usage Examples
4. Dependencies
5. Performance Notes
6. Best Practices
7. Testing Recommendations

Format as clean, maintainable documentation suitable for a development team.`,
};

export const CLIENT_COMMUNICATION: TemplateDefinitionInput = {
  name: "client_communication",
  description: "Client message for a situation in a given tone.",
  slots: ["situation", "client_type", "tone"],
  body: `Create a professional {{tone}} communication for a {{client_type}} client.

Situation: {{situation}}

Requirements:
- Professional and clear
- Appropriate for {{client_type}} client
- {{tone}} tone
- Actionable next steps
- Maintains positive relationship

Include:
1. Clear subject line
2. Professional greeting
3. Situation explanation
4. Proposed solution/action
5. Timeline if applicable
6. Call to action
7. Professional closing`,
};

export const TEST_CASES: TemplateDefinitionInput = {
  name: "test_cases",
  description: "Structured test plan for a feature.",
  slots: ["feature_description", "testing_type"],
  body: `Create comprehensive {{testing_type}} test cases for this feature:

Feature: {{feature_description}}

Please provide:
1. Test Case ID
2. Test Description
3. Preconditions
4. Test Steps
5. Expected Results
6. Test Data Requirements
7. Priority Level
8. Assumptions

Cover:
- Happy path scenarios
- Edge cases
- Error conditions
- Performance considerations
- Security aspects

Format as a structured test plan document.`,
};

export const DEVELOPMENT_ESTIMATE: TemplateDefinitionInput = {
  name: "development_estimate",
  description: "Hours, timeline and risks for a development task.",
  slots: ["task_description", "complexity_level", "team_size"],
  body: `Provide a detailed development estimate for this task:

Task: {{task_description}}
Complexity: {{complexity_level}}
Team Size: {{team_size}}

Please estimate:
1. Development Hours
2. Testing Hours
3. Documentation Hours
4. Review Hours
5. Total Timeline
6. Required Skills
7. Risk Factors
8. Dependencies

Provide estimates in a structured format with reasoning.`,
};

export const DEPLOYMENT_GUIDE: TemplateDefinitionInput = {
  name: "deployment_guide",
  description: "Step-by-step deployment guide for an environment.",
  slots: ["project_name", "environment", "tech_stack"],
  body: `Create a comprehensive deployment guide for {{project_name}}.

Environment: {{environment}}
Tech Stack: {{tech_stack}}

Include:
1. Prerequisites
2. Environment Setup
3. Installation Steps
4. Configuration
5. Database Setup
6. Security Configuration
7. Monitoring Setup
8. Troubleshooting
9. Rollback Procedures

Make it step-by-step and suitable for DevOps teams.`,
};

export const PROJECT_STATUS_REPORT: TemplateDefinitionInput = {
  name: "project_status_report",
  description: "Client-ready status report against milestones.",
  slots: ["project_name", "current_status", "milestones"],
  body: `Create a professional project status report for {{project_name}}.

Current Status: {{current_status}}
Key Milestones: {{milestones}}

Include:
1. Executive Summary
2. Progress Overview
3. Completed Deliverables
4. Current Sprint Status
5. Upcoming Milestones
6. Risks & Issues
7. Resource Utilization
8. Budget Status
9. Next Steps

Format as a client-ready status report.`,
};

export const TECHNICAL_INTERVIEW_QUESTIONS: TemplateDefinitionInput = {
  name: "technical_interview_questions",
  description: "Interview guide for a position and skill level.",
  slots: ["position", "skill_level", "focus_areas"],
  body: `Create technical interview questions for a {{position}} position.

Skill Level: {{skill_level}}
Focus Areas: {{focus_areas}}

Include:
1. Programming Fundamentals
2. Problem-Solving Questions
3. System Design Questions
4. Database Questions
5. Framework-Specific Questions
6. Behavioral Questions
7. Code Review Scenarios
8. Expected Answers/Rubric

Structure as a comprehensive interview guide.`,
};

export const SOFTWARE_HOUSE_TEMPLATES: readonly TemplateDefinitionInput[] = [
  TECHNICAL_SPEC,
  PROJECT_PROPOSAL,
  CODE_DOCUMENTATION,
  CLIENT_COMMUNICATION,
  TEST_CASES,
  DEVELOPMENT_ESTIMATE,
  DEPLOYMENT_GUIDE,
  PROJECT_STATUS_REPORT,
  TECHNICAL_INTERVIEW_QUESTIONS,
];
