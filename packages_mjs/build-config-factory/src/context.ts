import { getPrimaryRegistry, type BuildConfig, type PathConfig } from '@imageforge/build-yaml-config';
import {
    UNSAFE_SEGMENTS,
    isTemplateMapping,
    type TemplateMapping,
    type TemplateValue
} from '@imageforge/placeholder-resolver';

function cloneValue(value: TemplateValue): TemplateValue {
    if (Array.isArray(value)) {
        return value.map(cloneValue);
    }
    if (isTemplateMapping(value)) {
        return cloneMapping(value);
    }
    return value;
}

function cloneMapping(mapping: TemplateMapping): TemplateMapping {
    const result: TemplateMapping = {};
    for (const [key, value] of Object.entries(mapping)) {
        // An own `__proto__` key would be assigned as the clone's prototype
        if (UNSAFE_SEGMENTS.has(key)) {
            continue;
        }
        result[key] = cloneValue(value);
    }
    return result;
}

export class ContextBuilder {
    /**
     * Gather the raw lookup values for rendering. Nothing is rendered here;
     * `path.base` in particular may still be a template.
     *
     * Variables are reachable both as `{{ variables.x }}` and `{{ x }}`; the two
     * views are separate copies.
     */
    static build(config: BuildConfig): TemplateMapping {
        const context: TemplateMapping = {};

        // 1. Global variables, namespaced and flat
        if (Object.keys(config.variables).length > 0) {
            context.variables = cloneMapping(config.variables);
            Object.assign(context, cloneMapping(config.variables));
        }

        // 2. Computed registry variables from the primary entry
        if (Object.keys(config.registry.primary).length > 0) {
            const [, endpoint] = getPrimaryRegistry(config);

            context.registry_url = endpoint.url;
            context.registry_namespace = endpoint.namespace;

            const variables = isTemplateMapping(context.variables) ? context.variables : {};
            variables.registry_url = endpoint.url;
            variables.registry_namespace = endpoint.namespace;
            context.variables = variables;
        }

        // 3. Container build type
        if (config.build.type) {
            context.build = {
                type: {
                    container: {
                        image_basename: config.build.type.container.image_basename
                    }
                }
            };
        }

        // 4. Base path, possibly unresolved
        context.path = { base: config.path.base };

        return context;
    }

    /** New context whose `path` holds the resolved path values. */
    static withResolvedPaths(context: TemplateMapping, paths: PathConfig): TemplateMapping {
        return {
            ...context,
            path: {
                base: paths.base,
                downloads: paths.downloads,
                sources: paths.sources,
                build: paths.build,
                generated: {
                    libraries: paths.generated.libraries,
                    applications: paths.generated.applications
                }
            }
        };
    }
}
