import { createPageDriver } from "../src/driver";
import { expect, test } from "../src/fixture";

const LOGIN_PAGE = `data:text/html,${encodeURIComponent(`
	<h1>Sign in</h1>
	<input id="email">
	<input id="password" type="password">
	<button id="submit">Continue</button>
	<ul><li class="hint">Use your work email</li><li class="hint">Passwords are case sensitive</li></ul>
`)}`;

test("fills in the login form", { tag: "@smoke" }, async ({ traced, page }) => {
	await traced.navigate(LOGIN_PAGE);
	await traced.assertText("h1", "sign in");
	await traced.assertCount("li.hint", 2);

	await traced.fill("#email", "alice@example.com");
	await traced.fill("#password", "test-secret");
	await traced.click("#submit");

	await expect(page.locator("#password")).toHaveValue("test-secret");
});

test("skips through the handle", async ({ traced }) => {
	await traced.navigate(LOGIN_PAGE);
	test.skip(true, "signup flow not built yet");
});

test("reaches the page behind the driver", async ({ traced, page }) => {
	await traced.navigate(LOGIN_PAGE);

	const heading = await traced.action("read", "h1", async (step) =>
		step.driver.getText("h1"),
	);
	expect(heading).toBe("Sign in");
	expect(createPageDriver(page).page).toBe(page);
});
