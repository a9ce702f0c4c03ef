#!/usr/bin/env tsx
/**
 * Process entry point for the flash-batch command
 */

import { NodeContext, NodeRuntime } from "@effect/platform-node";
import { Effect } from "effect";
import { cli, teardown } from "./cli";

NodeRuntime.runMain(cli(process.argv).pipe(Effect.provide(NodeContext.layer)), {
  disableErrorReporting: true,
  teardown,
});
