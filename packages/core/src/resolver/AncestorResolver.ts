import { ResolverConfiguration } from "../configuration/ResolverConfiguration.js";
import type { DerivationRelation, Entity } from "../hierarchy/types.js";
import { consoleLogger } from "../logging/Logger.js";
import type { Logger } from "../logging/Logger.js";
import type { Sequence } from "../sequence/index.js";
import { walkHierarchy } from "../walker/index.js";
import { resolveAncestors } from "./resolveAncestors.js";

const names = (entities: Sequence<Entity<unknown>>): string =>
  entities.map((entity) => entity.name).join(", ");

/**
 * Resolution and walking bound to one derivation relation, a configuration
 * and a logger.
 *
 * Usage:
 * const resolver = new AncestorResolver(graph.derivesFrom);
 * const ancestors = resolver.resolve(registry, graph.entity("K"));
 * resolver.walk(ancestors, graph.instantiate("K"), (entity) => {
 *   console.log(`base = ${entity.name}`);
 * });
 */
export class AncestorResolver<T, E extends Entity<T> = Entity<T>> {
  constructor(
    private readonly derivesFrom: DerivationRelation<E>,
    private readonly configuration: ResolverConfiguration = ResolverConfiguration.parse(
      {}
    ),
    private readonly logger: Logger = consoleLogger
  ) {}

  private get tracing(): boolean {
    return this.configuration["ancestry.debug.trace"];
  }

  resolve(registry: Sequence<E>, query: E): Sequence<E> {
    if (this.tracing) {
      this.logger.log(
        `resolve ${query.name} against [${names(registry)}]`
      );
    }

    const ancestors = resolveAncestors(registry, query, this.derivesFrom, {
      onSelect: this.tracing
        ? ({ selected, remaining }) => {
            this.logger.log(
              `  select ${selected.name} from [${names(remaining)}]`
            );
          }
        : undefined,
    });

    if (this.tracing && ancestors.length === 0) {
      this.logger.log(`  no registered ancestors of ${query.name}`);
    }
    return ancestors;
  }

  /**
   * Visit every ancestor in order. With `ancestry.walk.narrow` on, each step
   * narrows `instance` through the ancestor first and is skipped when that
   * fails; with it off, every ancestor is visited with `instance` as is.
   */
  walk(
    ancestors: Sequence<E>,
    instance: T,
    visit: (entity: E, view: T) => void
  ): void {
    if (!this.configuration["ancestry.walk.narrow"]) {
      walkHierarchy(ancestors, instance, visit);
      return;
    }

    walkHierarchy(ancestors, instance, (entity, value) => {
      const view = entity.narrow(value);
      if (view.success) {
        visit(entity, view.data);
      } else if (this.tracing) {
        this.logger.log(`  skip ${entity.name}: instance does not narrow`);
      }
    });
  }
}
