// CHANGE: Vitest configuration for CORE/SHELL/APP tests
// WHY: Native ESM, explicit imports, no shared mock state between tests
// INVARIANT: Deterministic test execution without side effects outside temp directories

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // Tests import { describe, it, expect } from "vitest"
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: Clear mocks between tests
		// WHY: Console spies must not leak across tests
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
