// SPDX-License-Identifier: MPL-2.0
// SPDX-FileCopyrightText: 2026 Aryan Ameri <info@ameri.me>
//
// This Source Code Form is subject to the terms of the Mozilla Public
// License, v. 2.0. If a copy of the MPL was not distributed with this
// file, You can obtain one at https://mozilla.org/MPL/2.0/.

/**
 * Test helpers for providing Effect platform layers in tests.
 * NodeContext.layer provides FileSystem.FileSystem, CommandExecutor.CommandExecutor,
 * Path, and Terminal services from @effect/platform-node.
 */

import { NodeContext } from "@effect/platform-node";
import { Effect, type Layer, type Scope } from "effect";

/**
 * Test layer providing all platform services.
 * Use with runTest for effects requiring FileSystem.
 */
export const TestLayer: Layer.Layer<NodeContext.NodeContext> = NodeContext.layer;

/**
 * Run an effect in tests with platform services provided. Scoped resources
 * (temporary directories) are released when the effect completes.
 */
export const runTest = <A, E>(
  effect: Effect.Effect<A, E, NodeContext.NodeContext | Scope.Scope>
): Promise<A> => Effect.runPromise(effect.pipe(Effect.scoped, Effect.provide(TestLayer)));

