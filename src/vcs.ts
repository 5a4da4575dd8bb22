import { execFileSync } from "node:child_process";
import { ATTR_VCS_BRANCH, ATTR_VCS_COMMIT_SHA } from "./otel-attributes";

export type VcsInfo = {
	[ATTR_VCS_COMMIT_SHA]?: string;
	[ATTR_VCS_BRANCH]?: string;
};

/**
 * Commit SHA and branch of the working directory. CI-provided values win
 * over asking git; whatever can't be found is left out.
 */
export function getGitInfo(
	cwd: string = process.cwd(),
	env: NodeJS.ProcessEnv = process.env,
): VcsInfo {
	const info: VcsInfo = {};

	const sha = env.GITHUB_SHA || git(["rev-parse", "HEAD"], cwd);
	if (sha) {
		info[ATTR_VCS_COMMIT_SHA] = sha;
	}

	const branch =
		env.GITHUB_HEAD_REF ||
		env.GITHUB_REF_NAME ||
		git(["rev-parse", "--abbrev-ref", "HEAD"], cwd);
	if (branch) {
		info[ATTR_VCS_BRANCH] = branch;
	}

	return info;
}

function git(args: string[], cwd: string): string | undefined {
	try {
		const output = execFileSync("git", args, {
			cwd,
			encoding: "utf-8",
			stdio: ["ignore", "pipe", "ignore"],
		}).trim();
		return output || undefined;
	} catch (_err) {
		// Not a git checkout, or git isn't installed
		return undefined;
	}
}
