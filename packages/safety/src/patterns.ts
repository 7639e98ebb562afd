export type ForbiddenPattern = {
  pattern: RegExp;
  reason: string;
  /** Also applied to raw user text before any intent is resolved. */
  screensText: boolean;
};

export const METACHARACTERS = /[|><;`&\n\r]|\$\(/;

// a command word starts after anything that cannot be part of a package name
// (quotes, brackets, separators, a path prefix such as /usr/bin/)
const START = String.raw`(^|[^\w.+@-])`;
const END = String.raw`(?![\w.+@/-])`;

const word = (source: string, flags = ""): RegExp => new RegExp(`${START}${source}`, flags);

export const FORBIDDEN_PATTERNS: readonly ForbiddenPattern[] = [
  { pattern: word(String.raw`rm\s+(-\S*\s+)*-[a-z]*[rR]`, "i"), reason: "recursive removal is forbidden", screensText: true },
  { pattern: word(`dd${END}`), reason: "raw disk writes are forbidden", screensText: true },
  { pattern: word(String.raw`mkfs(\.\w+)?${END}`), reason: "creating filesystems is forbidden", screensText: true },
  { pattern: /\/dev\/(sd[a-z]|nvme\d|mmcblk\d|vd[a-z])/, reason: "block devices are off limits", screensText: true },
  {
    pattern: word(String.raw`(chmod|chown)(\s+\S+)*\s+\/(etc|usr|bin|sbin|lib|lib64|boot|var|root|dev|sys|proc)?(\/\S*)?${END}`),
    reason: "changing ownership or modes of system paths is forbidden",
    screensText: true,
  },
  { pattern: word(`(curl|wget)${END}`), reason: "downloading outside the package manager is forbidden", screensText: false },
  { pattern: word(`(bash|sh)${END}`), reason: "shell interpreters are forbidden", screensText: false },
];

export const findForbidden = (text: string, forScreening = false): ForbiddenPattern | undefined =>
  FORBIDDEN_PATTERNS.find((entry) => (!forScreening || entry.screensText) && entry.pattern.test(text));
