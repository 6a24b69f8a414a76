import { describe, expect, it } from "vitest";
import { createRunContext, isEventKind } from "../src/core/context.js";
import { shouldRun } from "../src/core/trigger.js";
import type { TriggerClause } from "../src/core/types.js";

const push = (ref: string) => createRunContext({ event: "push", ref, actor: "dev" });
const tag = (name: string) => createRunContext({ event: "tag_push", ref: name, actor: "dev" });
const pullRequest = (baseRef: string) =>
	createRunContext({ event: "pull_request", ref: "feature/login", baseRef, actor: "dev" });

const runs = (triggers: TriggerClause[], context: ReturnType<typeof push>): boolean =>
	shouldRun({ triggers }, context);

describe("run context", () => {
	it("normalizes branch refs", () => {
		expect(createRunContext({ event: "push", ref: "main", actor: "dev", sha: "abc123" })).toEqual({
			event: "push",
			ref: "refs/heads/main",
			refName: "main",
			refKind: "branch",
			actor: "dev",
			sha: "abc123",
		});
	});

	it("turns a push of a tag ref into a tag push", () => {
		const context = createRunContext({ event: "push", ref: "refs/tags/v1.0.0", actor: "dev" });
		expect(context.event).toBe("tag_push");
		expect(context.refKind).toBe("tag");
		expect(context.refName).toBe("v1.0.0");
	});

	it("requalifies a branch ref given for a tag push", () => {
		const context = createRunContext({ event: "tag_push", ref: "refs/heads/main", actor: "dev" });
		expect(context).toMatchObject({
			event: "tag_push",
			ref: "refs/tags/main",
			refName: "main",
			refKind: "tag",
		});
	});

	it("passes other qualified refs through", () => {
		const context = createRunContext({ event: "pull_request", ref: "refs/pull/7/merge", actor: "dev" });
		expect(context.ref).toBe("refs/pull/7/merge");
		expect(context.refKind).toBe("branch");
	});

	it("qualifies short tag names", () => {
		expect(tag("v2").ref).toBe("refs/tags/v2");
	});

	it("strips the prefix from the base ref and freezes the result", () => {
		const context = createRunContext({
			event: "pull_request",
			ref: "feature/login",
			baseRef: "refs/heads/main",
			actor: "dev",
		});
		expect(context.baseRef).toBe("main");
		expect(Object.isFrozen(context)).toBe(true);
	});

	it("recognizes event kinds", () => {
		expect(isEventKind("tag_push")).toBe(true);
		expect(isEventKind("workflow_dispatch")).toBe(false);
	});
});

describe("trigger matching", () => {
	it("never runs without triggers", () => {
		expect(runs([], push("main"))).toBe(false);
	});

	it("filters pushes by branch", () => {
		const triggers: TriggerClause[] = [{ event: "push", branches: ["main", "release/*"] }];
		expect(runs(triggers, push("main"))).toBe(true);
		expect(runs(triggers, push("release/2.0"))).toBe(true);
		expect(runs(triggers, push("feature/x"))).toBe(false);
		expect(runs(triggers, tag("v1.0.0"))).toBe(false);
	});

	it("ignores branches listed in branches-ignore", () => {
		const triggers: TriggerClause[] = [{ event: "push", branchesIgnore: ["docs/**"] }];
		expect(runs(triggers, push("docs/guide/intro"))).toBe(false);
		expect(runs(triggers, push("main"))).toBe(true);
	});

	it("runs an unfiltered push trigger for tags too", () => {
		expect(runs([{ event: "push" }], tag("v1.0.0"))).toBe(true);
	});

	it("filters tag pushes by tag and skips branches", () => {
		const triggers: TriggerClause[] = [{ event: "push", tags: ["v*"] }];
		expect(runs(triggers, tag("v1.0.0"))).toBe(true);
		expect(runs(triggers, tag("nightly"))).toBe(false);
		expect(runs(triggers, push("main"))).toBe(false);
	});

	it("filters pull requests by their base branch", () => {
		const triggers: TriggerClause[] = [{ event: "pull_request", branches: ["main"] }];
		expect(runs(triggers, pullRequest("main"))).toBe(true);
		expect(runs(triggers, pullRequest("develop"))).toBe(false);
		expect(runs(triggers, push("main"))).toBe(false);
	});

	it("runs when any clause matches", () => {
		const triggers: TriggerClause[] = [{ event: "pull_request" }, { event: "push", tags: ["v*"] }];
		expect(runs(triggers, pullRequest("develop"))).toBe(true);
		expect(runs(triggers, tag("v3"))).toBe(true);
		expect(runs(triggers, push("main"))).toBe(false);
	});
});
