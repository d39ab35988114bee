import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { fail, pass, probeError, warn } from "../../src/checks/probe-result.js";
import { walkSystemTree, type TreeEntry } from "../../src/probes/system-reader.js";
import {
  builtinCheck,
  createSystemRoot,
  currentIds,
  modeOf,
  putDir,
  putFile,
  removeSystemRoot,
  testContext,
} from "../helpers/system-root.js";

let root: string;

beforeEach(async () => {
  root = await createSystemRoot();
});

afterEach(async () => {
  await removeSystemRoot(root);
});

async function probe(id: string) {
  return await builtinCheck(id).probe(testContext(root));
}

async function fix(id: string): Promise<void> {
  await builtinCheck(id).remediation?.apply?.(testContext(root, { fixMode: true }));
}

describe("tree walk", () => {
  it("visits entries in name order and honours excludes", async () => {
    await putDir(root, "/etc");
    await putDir(root, "/proc");
    await putFile(root, "/etc/b", "");
    await putFile(root, "/etc/a", "");
    await putFile(root, "/proc/cpuinfo", "");

    const seen: string[] = [];
    await walkSystemTree(root, (entry: TreeEntry) => {
      seen.push(entry.systemPath);
    });
    expect(seen).toEqual(["/etc", "/etc/a", "/etc/b"]);
  });

  it("stops when the signal is aborted", async () => {
    await putDir(root, "/etc");
    const controller = new AbortController();
    controller.abort(new Error("stop"));
    await expect(
      walkSystemTree(root, () => undefined, { signal: controller.signal }),
    ).rejects.toThrow("stop");
  });
});

describe("filesystem checks", () => {
  it("FS-001 lists world-writable files outside temp directories", async () => {
    await putDir(root, "/srv");
    await putDir(root, "/tmp", 0o1777);
    await putFile(root, "/srv/app.log", "", 0o666);
    await putFile(root, "/srv/b.conf", "", 0o666);
    await putFile(root, "/srv/private", "", 0o600);
    await putFile(root, "/tmp/scratch", "", 0o666);

    expect(await probe("FS-001")).toEqual(
      fail("Found 2 world-writable files: /srv/app.log, /srv/b.conf"),
    );
  });

  it("FS-001 truncates long listings", async () => {
    await putDir(root, "/srv");
    for (const name of ["a1", "a2", "a3", "a4"]) {
      await putFile(root, `/srv/${name}`, "", 0o666);
    }
    expect(await probe("FS-001")).toEqual(
      fail("Found 4 world-writable files: /srv/a1, /srv/a2, /srv/a3, ..."),
    );
  });

  it("FS-001 remediation drops the world-write bit", async () => {
    await putDir(root, "/srv");
    await putFile(root, "/srv/app.log", "", 0o666);
    await fix("FS-001");
    expect(await modeOf(root, "/srv/app.log")).toBe("664");
    expect(await probe("FS-001")).toEqual(pass("No world-writable files found"));
  });

  it("FS-002 lists world-writable directories", async () => {
    await putDir(root, "/srv");
    await putDir(root, "/srv/shared", 0o777);
    expect(await probe("FS-002")).toEqual(
      fail("Found 1 world-writable directories: /srv/shared"),
    );
  });

  it("FS-003 counts SUID and SGID files", async () => {
    await putDir(root, "/usr");
    await putFile(root, "/usr/su", "", 0o4755);
    await putFile(root, "/usr/wall", "", 0o2755);
    expect(await probe("FS-003")).toEqual(pass("Found 1 SUID and 1 SGID files"));
  });

  it("FS-003 warns above twenty special binaries", async () => {
    await putDir(root, "/usr");
    for (let index = 0; index < 21; index += 1) {
      await putFile(root, `/usr/bin${index}`, "", 0o4755);
    }
    expect(await probe("FS-003")).toEqual(warn("Found 21 SUID and 0 SGID files"));
  });

  it("FS-004 reports wrong modes on critical files that exist", async () => {
    await putDir(root, "/etc");
    await putFile(root, "/etc/passwd", "", 0o644);
    await putFile(root, "/etc/shadow", "", 0o640);
    expect(await probe("FS-004")).toEqual(
      fail("/etc/shadow is 640 (expected 600)"),
    );

    await fix("FS-004");
    expect(await probe("FS-004")).toEqual(
      pass("Critical files have expected permissions"),
    );
  });

  it("FS-005 passes when every owner is known", async () => {
    const { uid, gid } = currentIds();
    await putDir(root, "/etc");
    await putFile(root, "/etc/passwd", `tester:x:${uid}:${gid}::/:/bin/sh\n`);
    await putFile(root, "/etc/group", `tester:x:${gid}:\n`);
    expect(await probe("FS-005")).toEqual(pass("No unowned files found"));
  });

  it("FS-005 warns about files without a known owner", async () => {
    const { uid, gid } = currentIds();
    const foreign = uid === 4242 || gid === 4242 ? 4343 : 4242;
    await putDir(root, "/etc");
    await putFile(root, "/etc/passwd", `ghost:x:${foreign}:${foreign}::/:/bin/sh\n`);
    await putFile(root, "/etc/group", `ghost:x:${foreign}:\n`);
    expect(await probe("FS-005")).toEqual(
      warn("Found 3 unowned files: /etc, /etc/group, /etc/passwd"),
    );
  });

  it("FS-005 reports ERROR without account databases", async () => {
    expect(await probe("FS-005")).toEqual(
      probeError("Cannot resolve owners: /etc/passwd or /etc/group not found"),
    );
  });

  it("FS-006 checks and fixes /tmp", async () => {
    expect(await probe("FS-006")).toEqual(fail("/tmp directory not found"));

    await putDir(root, "/tmp", 0o755);
    expect(await probe("FS-006")).toEqual(
      fail("/tmp has mode 755 (expected 1777)"),
    );

    await fix("FS-006");
    expect(await probe("FS-006")).toEqual(pass("/tmp has mode 1777"));
  });

  it("FS-007 requires the sticky bit on world-writable directories", async () => {
    await putDir(root, "/srv");
    await putDir(root, "/srv/drop", 0o777);
    await putDir(root, "/srv/spool", 0o1777);
    expect(await probe("FS-007")).toEqual(
      fail("Found 1 world-writable directories without sticky bit: /srv/drop"),
    );

    await fix("FS-007");
    expect(await modeOf(root, "/srv/drop")).toBe("1777");
    expect(await probe("FS-007")).toEqual(
      pass("All world-writable directories have the sticky bit"),
    );
  });
});
