import { describe, expect, it } from "vitest";
import { parseSshdConfig, setSshdOption } from "../../src/probes/sshd-config.js";

describe("sshd_config parsing", () => {
  it("keeps the first occurrence of a keyword", () => {
    const options = parseSshdConfig(
      ["PermitRootLogin no", "PermitRootLogin yes"].join("\n"),
    );
    expect(options.get("PermitRootLogin")).toBe("no");
  });

  it("matches keywords case-insensitively", () => {
    const options = parseSshdConfig("passwordauthentication No\n");
    expect(options.get("PasswordAuthentication")).toBe("No");
  });

  it("ignores comments and blank lines", () => {
    const options = parseSshdConfig(
      ["# PermitRootLogin yes", "", "   ", "X11Forwarding no"].join("\n"),
    );
    expect(options.get("PermitRootLogin")).toBeUndefined();
    expect(options.get("X11Forwarding")).toBe("no");
  });

  it("accepts the key=value form", () => {
    const options = parseSshdConfig("MaxAuthTries = 4\n");
    expect(options.get("maxauthtries")).toBe("4");
  });

  it("stops reading at the first Match block", () => {
    const options = parseSshdConfig(
      ["UsePAM yes", "Match User backup", "  PasswordAuthentication yes"].join(
        "\n",
      ),
    );
    expect(options.get("UsePAM")).toBe("yes");
    expect(options.get("PasswordAuthentication")).toBeUndefined();
  });
});

describe("sshd_config rewriting", () => {
  it("comments out existing lines and appends the new value", () => {
    const updated = setSshdOption(
      "Port 22\nPermitRootLogin yes\n",
      "PermitRootLogin",
      "no",
    );
    expect(updated).toBe("Port 22\n#PermitRootLogin yes\nPermitRootLogin no\n");
    expect(parseSshdConfig(updated).get("PermitRootLogin")).toBe("no");
  });

  it("inserts before the first Match block", () => {
    const updated = setSshdOption(
      "Port 22\nMatch User backup\n  X11Forwarding yes\n",
      "X11Forwarding",
      "no",
    );
    expect(updated).toBe(
      "Port 22\nX11Forwarding no\nMatch User backup\n  X11Forwarding yes\n",
    );
  });

  it("appends to content without a trailing newline", () => {
    expect(setSshdOption("Port 22", "UsePAM", "yes")).toBe("Port 22\nUsePAM yes");
  });
});
