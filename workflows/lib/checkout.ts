// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

import type { WorkflowStep } from "./github.ts";

export const CHECKOUT_ACTION = "actions/checkout@v4";

/**
 * Check out the repository.  The action's default shallow clone is used
 * unless a depth is requested.
 */
export function checkoutStep(depth?: number): WorkflowStep {
  const step: WorkflowStep = {
    name: "🛒 Checkout",
    uses: CHECKOUT_ACTION,
  };
  if (depth !== undefined) {
    step.with = { "fetch-depth": depth };
  }
  return step;
}
