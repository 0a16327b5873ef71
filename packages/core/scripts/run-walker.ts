import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { parseHierarchyDefinition } from "../src/hierarchy/index.js";
import { AncestorResolver } from "../src/resolver/index.js";
import { ResolverConfiguration } from "../src/configuration/ResolverConfiguration.js";
import { unwrap } from "../src/result/result.js";

const fixture = fileURLToPath(new URL("../fixtures/diamond.yaml", import.meta.url));
const { graph, registry } = unwrap(
  parseHierarchyDefinition(readFileSync(fixture, "utf8"))
);

const resolver = new AncestorResolver(
  graph.derivesFrom,
  ResolverConfiguration.parse({
    "ancestry.debug.trace": process.argv.includes("--trace"),
  })
);

for (const query of ["D", "K"]) {
  const ancestors = resolver.resolve(registry, graph.entity(query));
  resolver.walk(ancestors, graph.instantiate(query), (entity) => {
    console.log(`base = ${entity.name}`);
  });
  console.log();
}
