import js from "@eslint/js";
import tseslint from "typescript-eslint";
import stylistic from "@stylistic/eslint-plugin";
import globals from "globals";
import { defineConfig } from "eslint/config";
import type { ESLint } from "eslint";

export default defineConfig([
	js.configs.recommended,
	...tseslint.configs.strict,
	{
		files: ["**/*.ts"],
		plugins: {
			"@stylistic": stylistic as ESLint.Plugin,
		},
		languageOptions: {
			globals: {
				...globals.node,
			},
		},
		rules: {
			"@stylistic/indent": ["error", "tab"],
			"@stylistic/quotes": ["error", "double", { avoidEscape: true }],
			"@stylistic/semi": ["error", "always"],
			"@stylistic/comma-dangle": ["error", "always-multiline"],
			"@stylistic/object-curly-spacing": ["error", "always"],
			"@stylistic/brace-style": ["error", "1tbs", { allowSingleLine: true }],
			"@stylistic/eol-last": ["error", "always"],
			"@stylistic/no-multiple-empty-lines": ["error", { max: 1, maxEOF: 0 }],
			"@stylistic/no-trailing-spaces": "error",
			"@stylistic/member-delimiter-style": ["error", {
				multiline: { delimiter: "semi", requireLast: true },
				singleline: { delimiter: "semi", requireLast: false },
			}],

			"eqeqeq": ["error", "always"],
			"no-self-compare": "error",
			"no-template-curly-in-string": "warn",
			"@typescript-eslint/consistent-type-imports": ["error", { fixStyle: "inline-type-imports" }],
			"@typescript-eslint/no-non-null-assertion": "error",
			"@typescript-eslint/no-unused-vars": ["error", {
				argsIgnorePattern: "^_",
				varsIgnorePattern: "^_",
			}],
		},
	},
	{
		// Only the environment source reads the process environment
		files: ["packages/*/src/**/*.ts"],
		ignores: ["**/sources/environment-source.ts", "**/__tests__/**"],
		rules: {
			"no-restricted-properties": ["error", {
				object: "process",
				property: "env",
				message: "Read settings through a ConfigurationSource.",
			}],
		},
	},
	{
		ignores: [
			"**/dist/**",
			"**/node_modules/**",
			"**/coverage/**",
		],
	},
]);
