import { dir, errnoError, file, symlink, FakeFileSystem } from "../../__tests__/test-helpers/fake-file-system";
import type { SearchMessage } from "../../file-ops/scan-types";
import { BoundedChannel } from "../../utils/bounded-channel";
import type { IgnoreMatcher } from "../../utils/ignore-utils";
import { runWalker } from "../bfs-walker";
import { createSearchFilter, type SearchFilterInput } from "../search-filter";

const ROOT = "/r";

const sampleTree = () =>
  dir({
    "a.txt": file(),
    sub: dir({
      "b.txt": file(),
      deeper: dir({ "d.txt": file() })
    }),
    "c.txt": file(),
    other: dir({ "e.txt": file() })
  });

async function walk(fileSystem: FakeFileSystem, input: SearchFilterInput = {}, ignoreMatcher: IgnoreMatcher | null = null) {
  const channel = new BoundedChannel<SearchMessage>(1000);
  const summary = await runWalker(createSearchFilter({ root: ROOT, ...input }), channel, { fileSystem, ignoreMatcher });
  const messages: SearchMessage[] = [];
  for await (const message of channel) {
    messages.push(message);
  }
  return { summary, messages, channel };
}

const match = (path: string): SearchMessage => ({ type: "match", path });

describe("runWalker", () => {
  it("emits matches in breadth-first discovery order", async () => {
    const fs = new FakeFileSystem(ROOT, sampleTree());
    const { messages, summary } = await walk(fs);

    expect(messages).toEqual([
      match("/r/a.txt"),
      match("/r/c.txt"),
      match("/r/sub/b.txt"),
      match("/r/other/e.txt"),
      match("/r/sub/deeper/d.txt")
    ]);
    expect(fs.listed).toEqual(["/r", "/r/sub", "/r/other", "/r/sub/deeper"]);
    expect(summary).toEqual({ directoriesListed: 4, matches: 5, failures: 0, cancelled: false });
  });

  it("closes the channel when the walk ends", async () => {
    const { channel } = await walk(new FakeFileSystem(ROOT, sampleTree()));
    expect(channel.isClosed).toBe(true);
    expect(channel.isCancelled).toBe(false);
  });

  describe("depth limit", () => {
    it("lists only the root at max depth 0", async () => {
      const fs = new FakeFileSystem(ROOT, sampleTree());
      const { messages } = await walk(fs, { maxDepth: 0 });

      expect(messages).toEqual([match("/r/a.txt"), match("/r/c.txt")]);
      expect(fs.listed).toEqual(["/r"]);
    });

    it("never lists a directory deeper than the limit", async () => {
      const fs = new FakeFileSystem(ROOT, sampleTree());
      const { messages } = await walk(fs, { maxDepth: 1 });

      expect(messages).toEqual([
        match("/r/a.txt"),
        match("/r/c.txt"),
        match("/r/sub/b.txt"),
        match("/r/other/e.txt")
      ]);
      expect(fs.listed).toEqual(["/r", "/r/sub", "/r/other"]);
    });
  });

  describe("error isolation", () => {
    it("reports an unreadable directory once and keeps walking", async () => {
      const fs = new FakeFileSystem(ROOT, sampleTree());
      fs.listFailures.set("/r/sub", errnoError("EACCES", "EACCES: permission denied, opendir '/r/sub'"));

      const { messages, summary } = await walk(fs);

      expect(messages).toEqual([
        match("/r/a.txt"),
        match("/r/c.txt"),
        {
          type: "failure",
          path: "/r/sub",
          operation: "list",
          code: "PERMISSION_DENIED",
          message: "EACCES: permission denied, opendir '/r/sub'"
        },
        match("/r/other/e.txt")
      ]);
      expect(summary).toEqual({ directoriesListed: 2, matches: 3, failures: 1, cancelled: false });
    });

    it("reports an entry whose metadata cannot be read and moves to its siblings", async () => {
      const fs = new FakeFileSystem(ROOT, sampleTree());
      fs.statFailures.set("/r/c.txt", errnoError("ENOENT", "ENOENT: no such file or directory, lstat '/r/c.txt'"));

      const { messages } = await walk(fs, { maxDepth: 0 });

      expect(messages).toEqual([
        match("/r/a.txt"),
        {
          type: "failure",
          path: "/r/c.txt",
          operation: "stat",
          code: "NOT_FOUND",
          message: "ENOENT: no such file or directory, lstat '/r/c.txt'"
        }
      ]);
    });

    it("keeps what a directory listing yielded before it broke", async () => {
      const fs = new FakeFileSystem(ROOT, sampleTree());
      fs.listBreaks.set("/r", { after: 1, error: errnoError("EIO", "EIO: i/o error, readdir '/r'") });

      const { messages, summary } = await walk(fs);

      expect(messages).toEqual([
        match("/r/a.txt"),
        { type: "failure", path: "/r", operation: "list", code: "FILE_SYSTEM_ERROR", message: "EIO: i/o error, readdir '/r'" }
      ]);
      expect(summary.directoriesListed).toBe(0);
    });

    it("yields a single failure and no matches for a missing root", async () => {
      const fs = new FakeFileSystem("/elsewhere", sampleTree());
      const { messages } = await walk(fs);

      expect(messages).toEqual([
        {
          type: "failure",
          path: "/r",
          operation: "list",
          code: "NOT_FOUND",
          message: "ENOENT: no such file or directory, opendir '/r'"
        }
      ]);
    });
  });

  describe("hidden entries", () => {
    const hiddenTree = () =>
      dir({
        "visible.txt": file(),
        "flagged.txt": file({ hidden: true }),
        ".dot.txt": file(),
        attrDir: dir({ "inner.txt": file() }, { hidden: true }),
        ".dotDir": dir({ "inside.txt": file() })
      });

    it("skips names with the hidden marker and entries with the hidden attribute", async () => {
      const fs = new FakeFileSystem(ROOT, hiddenTree());
      const { messages } = await walk(fs);

      expect(messages).toEqual([match("/r/visible.txt")]);
      expect(fs.listed).toEqual(["/r"]);
    });

    it("includes hidden files and descends into hidden directories when asked", async () => {
      const fs = new FakeFileSystem(ROOT, hiddenTree());
      const { messages } = await walk(fs, { includeHidden: true });

      expect(messages).toEqual([
        match("/r/visible.txt"),
        match("/r/flagged.txt"),
        match("/r/.dot.txt"),
        match("/r/attrDir/inner.txt"),
        match("/r/.dotDir/inside.txt")
      ]);
    });
  });

  describe("ignore rules", () => {
    const ignoreSub = (): IgnoreMatcher => ({
      root: ROOT,
      isIgnored: jest.fn((entryPath: string, isDirectory: boolean) => isDirectory && entryPath === "/r/sub")
    });

    it("skips ignored directories without listing or reporting them", async () => {
      const fs = new FakeFileSystem(ROOT, sampleTree());
      const matcher = ignoreSub();
      const { messages } = await walk(fs, {}, matcher);

      expect(messages).toEqual([match("/r/a.txt"), match("/r/c.txt"), match("/r/other/e.txt")]);
      expect(fs.listed).toEqual(["/r", "/r/other"]);
      expect(fs.statted).not.toContain("/r/sub");
      expect(matcher.isIgnored).toHaveBeenCalledWith("/r/sub", true);
      expect(matcher.isIgnored).toHaveBeenCalledWith("/r/a.txt", false);
    });

    it("does not consult the matcher when ignored entries are included", async () => {
      const fs = new FakeFileSystem(ROOT, sampleTree());
      const matcher = ignoreSub();
      const { messages } = await walk(fs, { includeIgnored: true }, matcher);

      expect(messages).toHaveLength(5);
      expect(matcher.isIgnored).not.toHaveBeenCalled();
    });
  });

  it("applies pattern and extension filters to files only", async () => {
    const fs = new FakeFileSystem(
      ROOT,
      dir({
        "report.md": file(),
        "report.TXT": file(),
        "notes.txt": file(),
        reports: dir({ "report-2.txt": file(), README: file() })
      })
    );

    const { messages } = await walk(fs, { pattern: "report*", extensions: ["txt"] });

    expect(messages).toEqual([match("/r/report.TXT"), match("/r/reports/report-2.txt")]);
  });

  it("treats a symlink as a file and does not follow it", async () => {
    const fs = new FakeFileSystem(ROOT, dir({ link: symlink() }));
    const { messages } = await walk(fs);

    expect(messages).toEqual([match("/r/link")]);
    expect(fs.listed).toEqual(["/r"]);
  });

  it("stops inside a directory as soon as the consumer cancels", async () => {
    const children: Record<string, ReturnType<typeof file>> = {};
    for (let i = 0; i < 20; i++) {
      children[`miss-${i}.dat`] = file();
    }
    const fs = new FakeFileSystem(ROOT, dir({ ...children, "hit.txt": file() }));
    const channel = new BoundedChannel<SearchMessage>(1);

    const completion = runWalker(createSearchFilter({ root: ROOT, pattern: "hit" }), channel, { fileSystem: fs });
    channel.cancel();
    const summary = await completion;

    expect(summary).toEqual({ directoriesListed: 0, matches: 0, failures: 0, cancelled: true });
    expect(fs.listed).toEqual(["/r"]);
    expect(fs.statted).toEqual([]);
  });

  it("stops producing once the consumer cancels", async () => {
    const children: Record<string, ReturnType<typeof file>> = {};
    for (let i = 0; i < 20; i++) {
      children[`file-${i}.txt`] = file();
    }
    const fs = new FakeFileSystem(ROOT, dir({ ...children, later: dir({ "x.txt": file() }) }));
    const channel = new BoundedChannel<SearchMessage>(1);

    const completion = runWalker(createSearchFilter({ root: ROOT }), channel, { fileSystem: fs });
    const first = await channel.receive();
    channel.cancel();
    const summary = await completion;

    expect(first).toEqual({ done: false, value: match("/r/file-0.txt") });
    expect(summary.cancelled).toBe(true);
    expect(summary.matches).toBeLessThanOrEqual(2);
    expect(fs.listed).toEqual(["/r"]);
  });
});
