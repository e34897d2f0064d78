import { describe, expect, it, vi } from "vitest";

import { GitHubClient } from "../src/githubClient.js";
import { GitHubHost } from "../src/gitHubHost.js";
import { GitWorkspace } from "../src/gitWorkspace.js";
import { git, makeGitFixture } from "./helpers/gitFixture.js";

const BRANCH = "security/dependency-update/requests-2.31.0";

function host(checkout = "/tmp/unused-checkout"): { host: GitHubHost; client: GitHubClient } {
  const client = new GitHubClient("ghs_test-secret");
  return { host: new GitHubHost(client, new GitWorkspace(checkout), "acme", "app"), client };
}

describe("GitHubHost", () => {
  it("treats a branch with an open pull request as existing", async () => {
    const { host: github, client } = host();
    vi.spyOn(client, "branchExists").mockResolvedValue(false);
    const findPr = vi
      .spyOn(client, "findOpenPullRequest")
      .mockResolvedValue({ number: 5, url: "https://github.test/acme/app/pull/5" });

    expect(await github.branchExists(BRANCH)).toBe(true);
    expect(findPr).toHaveBeenCalledWith("acme", "app", BRANCH);
  });

  it("reports a branch as missing when neither the branch nor a pull request exists", async () => {
    const { host: github, client } = host();
    vi.spyOn(client, "branchExists").mockResolvedValue(false);
    vi.spyOn(client, "findOpenPullRequest").mockResolvedValue(null);

    expect(await github.branchExists(BRANCH)).toBe(false);
  });

  it("skips the pull request lookup when the branch exists", async () => {
    const { host: github, client } = host();
    vi.spyOn(client, "branchExists").mockResolvedValue(true);
    const findPr = vi.spyOn(client, "findOpenPullRequest").mockResolvedValue(null);

    expect(await github.branchExists(BRANCH)).toBe(true);
    expect(findPr).not.toHaveBeenCalled();
  });

  it("returns the checkout to the base branch after committing", async () => {
    const { remote, checkout } = makeGitFixture({ "requirements.txt": "requests==2.25.0\n" });
    const { host: github } = host(checkout);

    await github.createBranch(BRANCH, "main");
    const sha = await github.commitFiles(BRANCH, "fix(deps): update requests to 2.31.0", [
      { path: "requirements.txt", content: "requests==2.31.0\n" },
    ]);

    expect(git(checkout, "rev-parse", "--abbrev-ref", "HEAD")).toBe("main");
    expect(git(remote, "rev-parse", `refs/heads/${BRANCH}`)).toBe(sha);
  });

  it("opens pull requests through the client", async () => {
    const { host: github, client } = host();
    const create = vi
      .spyOn(client, "createPullRequest")
      .mockResolvedValue({ number: 12, url: "https://github.test/acme/app/pull/12" });
    const request = {
      title: "[Security] Update requests to 2.31.0",
      body: "body",
      head: BRANCH,
      base: "main",
      labels: ["security"],
    };

    expect(await github.openPullRequest(request)).toEqual({
      number: 12,
      url: "https://github.test/acme/app/pull/12",
    });
    expect(create).toHaveBeenCalledWith("acme", "app", request);
  });
});
