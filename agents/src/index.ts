// SPDX-FileCopyrightText: 2024 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0

/**
 * Context-aware interruption handling for voice agents: decides whether user speech heard while
 * the agent is talking should be ignored, should interrupt the agent, or starts a new turn.
 *
 * @packageDocumentation
 */
import * as cli from './cli.js';
import * as interruption from './interruption/index.js';

export * from './_exceptions.js';
export * from './log.js';
export * from './utils.js';
export * from './version.js';

export { cli, interruption };
