// SPDX-FileCopyrightText: 2025 LiveKit, Inc.
//
// SPDX-License-Identifier: Apache-2.0
export * from './agent_speech.js';
export * from './classifier.js';
export * from './config.js';
export * from './coordinator.js';
export * from './defaults.js';
export * from './dispatcher.js';
export * from './lexicon.js';
export * from './metrics.js';
export * from './session.js';
export * from './similarity.js';
export * from './simulation.js';
export * from './types.js';
export * from './utils.js';
