// This file is part of LensKit.
// Copyright (C) 2018-2023 Boise State University
// Copyright (C) 2023-2025 Drexel University
// Licensed under the MIT license, see LICENSE.md for details.
// SPDX-License-Identifier: MIT

/**
 * Definitions used for the other workflow modules.
 * @module
 */

export const GUIDE_PYTHON = "3.10";
export const GUIDE_PLATFORM = "ubuntu-latest";

/** Dependency manifest whose hash keys the pip cache. */
export const MANIFEST = "setup.py";
export const GUIDE_SCRIPT = "shell/run_guides.sh";

export const PROJECT_EXTRAS = ["tensorflow-cpu", "tests"];
export const TENSORFLOW_PIN = "2.16.0rc0";

export const SETUP_PYTHON_ACTION = "actions/setup-python@v5";
export const CACHE_ACTION = "actions/cache@v3";
