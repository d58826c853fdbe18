import type { Workflow } from "./lib/github.ts";

import {
  GUIDE_PLATFORM,
  GUIDE_PYTHON,
  GUIDE_SCRIPT,
  MANIFEST,
  PROJECT_EXTRAS,
  TENSORFLOW_PIN,
} from "./lib/defs.ts";
import { guideJob } from "./guides/common.ts";

export const workflow: Workflow = {
  name: "Integration tests using keras.io guides",
  on: {
    workflow_dispatch: {},
  },
  permissions: {
    contents: "read",
  },
  jobs: {
    guides: guideJob({
      key: "guides",
      name: "Run tests",
      runs_on: GUIDE_PLATFORM,
      python: GUIDE_PYTHON,
      manifest: MANIFEST,
      project: {
        extras: PROJECT_EXTRAS,
        editable: true,
        upgrade: true,
        quiet: true,
      },
      backends: [
        { package: "jax", extras: ["cpu"], upgrade: true, quiet: true },
        { package: "tensorflow", pin: TENSORFLOW_PIN },
      ],
      script: GUIDE_SCRIPT,
    }),
  },
};
