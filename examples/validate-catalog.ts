import { CheckoutConfigSource, definePluginCatalog, formatViolations, FsRepository } from "../src/index.js";

async function main() {
  const repository = new FsRepository(".");
  const catalog = definePluginCatalog({ reservedNames: ["claude-plugins-official"] })({ repository });

  const violations = await catalog.validateCatalog();
  if (violations.length > 0) {
    console.error(formatViolations(violations));
    process.exitCode = 1;
    return;
  }

  const { manifestPath } = catalog.getConfig();
  const result = await catalog.refresh(new CheckoutConfigSource(repository, "checkouts", manifestPath));
  console.log(result.changed ? `Updated to ${result.version}` : "Catalog is up to date");
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
