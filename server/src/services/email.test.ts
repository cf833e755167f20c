import { describe, expect, it } from "vitest";
import {
  buildLetter,
  buildLink,
  escapeHtml,
  expiryCopy,
  isMailProvider,
  sendMail,
} from "./email.js";
import { silentLogger, TEST_MAIL_CONFIG } from "../test/helpers.js";

describe("email letters", () => {
  it("puts the token into the link template", () => {
    expect(buildLink("https://app.test/verify?token={token}", "abc123")).toBe(
      "https://app.test/verify?token=abc123",
    );
    expect(buildLink("https://app.test/{token}/{token}", "t")).toBe("https://app.test/t/t");
  });

  it("describes link lifetimes", () => {
    expect(expiryCopy(7 * 24 * 3600)).toBe("7 days");
    expect(expiryCopy(24 * 3600)).toBe("24 hours");
    expect(expiryCopy(3600)).toBe("1 hour");
    expect(expiryCopy(600)).toBe("10 minutes");
  });

  it("builds the registration letter", () => {
    const letter = buildLetter(TEST_MAIL_CONFIG, "registration", "Tok123");
    expect(letter.subject).toBe("Confirm your Gatehouse registration");
    expect(letter.text.split("\n")).toEqual([
      "Please confirm your email address by opening the link below:",
      "",
      "http://app.test/registration/verify?token=Tok123",
      "",
      "This link expires in 7 days. If you didn't sign up, you can ignore this email.",
      "",
      "Gatehouse",
    ]);
    expect(letter.html).toContain('href="http://app.test/registration/verify?token=Tok123"');
  });

  it("builds change-email and reset letters from their own templates", () => {
    const change = buildLetter(TEST_MAIL_CONFIG, "change_email", "Tok123");
    expect(change.subject).toBe("Confirm your new Gatehouse email");
    expect(change.text).toContain("http://app.test/email/verify?token=Tok123");
    expect(change.text).toContain("This link expires in 24 hours.");

    const reset = buildLetter(TEST_MAIL_CONFIG, "reset_password", "Tok123");
    expect(reset.subject).toBe("Reset your Gatehouse password");
    expect(reset.text).toContain("http://app.test/password/reset?token=Tok123");
  });

  it("escapes html", () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;",
    );
  });

  it("knows its providers", () => {
    expect(isMailProvider("smtp")).toBe(true);
    expect(isMailProvider("log")).toBe(true);
    expect(isMailProvider("mailgun")).toBe(false);
  });
});

describe("sendMail", () => {
  const letter = { to: "ada@example.com", subject: "s", text: "t", html: "<p>t</p>" };

  it("drops mail when no provider is configured", async () => {
    expect(await sendMail({ ...TEST_MAIL_CONFIG, provider: "none" }, silentLogger, letter)).toEqual({
      sent: false,
    });
  });

  it("writes mail to the log with the log provider", async () => {
    expect(await sendMail({ ...TEST_MAIL_CONFIG, provider: "log" }, silentLogger, letter)).toEqual({
      sent: true,
    });
  });
});
