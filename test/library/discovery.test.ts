/**
 * Tests for library discovery and taxon map assembly
 */

import { Either } from "effect";
import { mkdirSync, readFileSync, rmSync, symlinkSync, writeFileSync } from "fs";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { MissingInputError } from "../../src/errors";
import { discoverLibrary, findFiles, SEQUENCE_EXTENSIONS } from "../../src/library/discovery";
import { collectTaxonMaps } from "../../src/library/taxon-map";
import { runEither, scratchDir } from "../utils/platform";

describe("Library discovery", () => {
  let root: string;
  let library: string;

  beforeEach(() => {
    root = scratchDir();
    library = join(root, "library");
    mkdirSync(join(library, "viral"), { recursive: true });
    mkdirSync(join(root, "elsewhere"), { recursive: true });

    writeFileSync(join(library, "human.fna"), ">h1\nACGT\n");
    writeFileSync(join(library, "viral", "phage.ffn"), ">p1\nGGCC\n");
    writeFileSync(join(library, "viral", "phage.fasta"), ">ignored\nA\n");
    writeFileSync(join(library, "notes.txt"), "not a sequence\n");
    writeFileSync(join(root, "elsewhere", "linked.fa"), ">l1\nTTAA\n");
    symlinkSync(join(root, "elsewhere"), join(library, "linked"), "dir");
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe("findFiles", () => {
    test("should find sequence files recursively through symlinks", async () => {
      const result = await runEither(findFiles([library], SEQUENCE_EXTENSIONS));

      expect(Either.getOrNull(result)).toEqual([
        join(library, "human.fna"),
        join(library, "linked", "linked.fa"),
        join(library, "viral", "phage.ffn"),
      ]);
    });

    test("should list each root's files in the order the roots are given", async () => {
      const extra = join(root, "extra");
      mkdirSync(extra);
      writeFileSync(join(extra, "added.fna"), ">a1\nCCCC\n");

      const result = await runEither(findFiles([library, extra], SEQUENCE_EXTENSIONS));

      expect(Either.getOrNull(result)).toEqual([
        join(library, "human.fna"),
        join(library, "linked", "linked.fa"),
        join(library, "viral", "phage.ffn"),
        join(extra, "added.fna"),
      ]);
    });

    test("should match a single extension", async () => {
      const result = await runEither(findFiles([library], [".ffn"]));
      expect(Either.getOrNull(result)).toEqual([join(library, "viral", "phage.ffn")]);
    });
  });

  describe("discoverLibrary", () => {
    test("should write a manifest on first discovery", async () => {
      const manifestPath = join(root, "library-files.txt");
      const result = await runEither(discoverLibrary([library], manifestPath));

      expect(Either.isRight(result)).toBe(true);
      if (Either.isLeft(result)) return;
      expect(result.right.cached).toBe(false);
      expect(result.right.files).toHaveLength(3);
      expect(readFileSync(manifestPath, "utf8")).toBe(`${result.right.files.join("\n")}\n`);
    });

    test("should reuse an existing manifest", async () => {
      const manifestPath = join(root, "library-files.txt");
      writeFileSync(manifestPath, "/data/a.fna\n/data/b.fa\n");

      const result = await runEither(discoverLibrary([library], manifestPath));
      expect(Either.getOrNull(result)).toEqual({
        path: manifestPath,
        files: ["/data/a.fna", "/data/b.fa"],
        cached: true,
      });
    });

    test("should rediscover when the manifest is empty", async () => {
      const manifestPath = join(root, "library-files.txt");
      writeFileSync(manifestPath, "");

      const result = await runEither(discoverLibrary([library], manifestPath));
      expect(Either.isRight(result)).toBe(true);
      if (Either.isRight(result)) {
        expect(result.right.cached).toBe(false);
        expect(result.right.files).toHaveLength(3);
      }
    });

    test("should fail when the library holds no sequence files", async () => {
      const empty = join(root, "empty");
      mkdirSync(empty);

      const result = await runEither(discoverLibrary([empty], join(root, "library-files.txt")));
      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left).toBeInstanceOf(MissingInputError);
        expect(result.left.message).toBe(`No fna, fa, ffn files found in ${empty}`);
      }
    });

    test("should name every root when none holds sequence files", async () => {
      const first = join(root, "empty1");
      const second = join(root, "empty2");
      mkdirSync(first);
      mkdirSync(second);

      const result = await runEither(
        discoverLibrary([first, second], join(root, "library-files.txt"))
      );
      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left.message).toBe(`No fna, fa, ffn files found in ${first} ${second}`);
      }
    });
  });

  describe("collectTaxonMaps", () => {
    test("should concatenate every map sidecar and count its lines", async () => {
      writeFileSync(join(library, "human.map"), "h1\t9606\n");
      writeFileSync(join(library, "viral", "phage.map"), "p1\t10760\np2\t10760\n");
      const out = join(root, "seqid2taxid.map");

      const result = await runEither(collectTaxonMaps([library], out));

      expect(Either.getOrNull(result)).toBe(3);
      expect(readFileSync(out, "utf8")).toBe("h1\t9606\np1\t10760\np2\t10760\n");
    });

    test("should append the sidecars of later roots", async () => {
      const extra = join(root, "extra");
      mkdirSync(extra);
      writeFileSync(join(library, "human.map"), "h1\t9606\n");
      writeFileSync(join(extra, "added.map"), "a1\t562\n");
      const out = join(root, "seqid2taxid.map");

      const result = await runEither(collectTaxonMaps([library, extra], out));

      expect(Either.getOrNull(result)).toBe(2);
      expect(readFileSync(out, "utf8")).toBe("h1\t9606\na1\t562\n");
    });

    test("should write an empty map when the library has no sidecars", async () => {
      const out = join(root, "seqid2taxid.map");
      const result = await runEither(collectTaxonMaps([library], out));

      expect(Either.getOrNull(result)).toBe(0);
      expect(readFileSync(out, "utf8")).toBe("");
    });
  });
});
