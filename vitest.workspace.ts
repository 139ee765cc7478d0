import { defineWorkspace } from "vitest/config";

export default defineWorkspace(["packages/@solokit/core", "packages/@solokit/singletons"]);
