#!/usr/bin/env node
// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
import { runCli } from './cli.js';

runCli().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
