import { describe, expect, it } from "vitest";
import { getGitInfo } from "../src/vcs";

describe("getGitInfo", () => {
	it("prefers the values CI provides", () => {
		expect(
			getGitInfo("/nonexistent", {
				GITHUB_SHA: "abc123",
				GITHUB_HEAD_REF: "feature/login",
				GITHUB_REF_NAME: "42/merge",
			}),
		).toEqual({ "vcs.commit.sha": "abc123", "vcs.branch": "feature/login" });
	});

	it("falls back to the ref name outside pull requests", () => {
		expect(
			getGitInfo("/nonexistent", {
				GITHUB_SHA: "abc123",
				GITHUB_HEAD_REF: "",
				GITHUB_REF_NAME: "main",
			}),
		).toEqual({ "vcs.commit.sha": "abc123", "vcs.branch": "main" });
	});

	it("leaves out what git can't tell", () => {
		expect(getGitInfo("/nonexistent/tracewright-checkout", {})).toEqual({});
	});
});
