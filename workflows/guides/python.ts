import type { WorkflowStep } from "../lib/github.ts";
import { CACHE_ACTION, SETUP_PYTHON_ACTION } from "../lib/defs.ts";
import { script } from "../lib/script.ts";
import type { GuideJobSpec } from "./spec.ts";

export const PIP_CACHE_STEP = "pip-cache";

export function pipCacheKey(os: string, hash: string): string {
  return `${os}-pip-${hash}`;
}

export function pythonSetup(spec: GuideJobSpec): WorkflowStep[] {
  return [
    {
      name: `🐍 Set up Python ${spec.python}`,
      uses: SETUP_PYTHON_ACTION,
      with: {
        "python-version": spec.python,
      },
    },
    {
      name: "🔧 Upgrade pip and find its cache",
      id: PIP_CACHE_STEP,
      run: script(`
        python -m pip install --upgrade pip setuptools
        echo "dir=$(pip cache dir)" >> $GITHUB_OUTPUT
      `),
    },
    {
      name: "🗃️ Cache pip packages",
      uses: CACHE_ACTION,
      with: {
        path: `\${{ steps.${PIP_CACHE_STEP}.outputs.dir }}`,
        key: pipCacheKey(
          "${{ runner.os }}",
          `\${{ hashFiles('${spec.manifest}') }}`,
        ),
      },
    },
  ];
}
