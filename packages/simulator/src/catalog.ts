import { z } from "zod";
import rawCatalog from "../data/catalog.json";

const versionsSchema = z.record(z.string().min(1));

const catalogSchema = z.object({
  repo: versionsSchema,
  aur: versionsSchema,
});

export type PackageCatalog = z.infer<typeof catalogSchema>;

export type PackageOrigin = "repo" | "aur";

export type CatalogEntry = {
  name: string;
  version: string;
  origin: PackageOrigin;
};

export const AUR_SUFFIXES = ["-bin", "-git", "-svn", "-hg", "-nightly"] as const;

export const loadCatalog = (raw: unknown = rawCatalog): PackageCatalog => catalogSchema.parse(raw);

const defaultCatalog = loadCatalog();

export const versionOf = (catalog: PackageCatalog, origin: PackageOrigin, name: string): string | undefined =>
  Object.hasOwn(catalog[origin], name) ? catalog[origin][name] : undefined;

/** Looks a package up in the given origins, in order. */
export const lookupPackage = (
  catalog: PackageCatalog,
  name: string,
  origins: PackageOrigin[] = ["repo", "aur"]
): CatalogEntry | undefined => {
  for (const origin of origins) {
    const version = versionOf(catalog, origin, name);
    if (version !== undefined) return { name, version, origin };
  }
  return undefined;
};

/**
 * True when the name is only available from the AUR: either a known AUR
 * package or one following the AUR naming conventions for prebuilt and VCS
 * packages.
 */
export const looksLikeAurPackage = (name: string, catalog: PackageCatalog = defaultCatalog): boolean => {
  if (versionOf(catalog, "repo", name) !== undefined) return false;
  if (versionOf(catalog, "aur", name) !== undefined) return true;
  return AUR_SUFFIXES.some((suffix) => name.endsWith(suffix));
};
