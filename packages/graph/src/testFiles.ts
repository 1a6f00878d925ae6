import { normalizePath } from "@codepulse/store";

const TEST_DIRECTORIES = new Set(["test", "tests", "__tests__", "spec", "specs"]);

const TEST_BASENAMES = [
  /^test_/,
  /_test\.[^.]+$/,
  /\.test\.[^.]+$/,
  /\.spec\.[^.]+$/,
  /_spec\.[^.]+$/,
  /^conftest\.py$/,
];

/**
 * Path heuristic for test sources: a test directory anywhere in the path,
 * or a test-style file name.
 */
export function isTestFile(path: string): boolean {
  const segments = normalizePath(path).split("/");
  const basename = segments.pop() ?? "";

  if (segments.some((segment) => TEST_DIRECTORIES.has(segment))) return true;
  return TEST_BASENAMES.some((pattern) => pattern.test(basename));
}
