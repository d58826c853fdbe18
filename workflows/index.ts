import type { WorkflowModule } from "./lib/render.ts";
import { workflow as integrationTests } from "./integration-tests.ts";

export const WORKFLOWS: WorkflowModule[] = [
  {
    name: "integration_tests",
    source: "workflows/integration-tests.ts",
    workflow: integrationTests,
  },
];

export function findWorkflow(name: string): WorkflowModule | undefined {
  return WORKFLOWS.find((w) => w.name == name);
}
