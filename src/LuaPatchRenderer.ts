import type { GenericVariantPlan, JsonObject, JsonValue, PatchPlan, RecipeVariant, RecipeVariantPlan, TechnologyAlternative, TechnologyPathPlan } from './types.js';
import { ingredientsToJson, isJsonObject, readIngredients } from './values.js';

const INDENT = '    ';
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function pad(level: number): string {
    return INDENT.repeat(level);
}

export function luaString(value: string): string {
    let escaped = '';
    for (const char of value) {
        const code = char.charCodeAt(0);
        if (char === '\\') escaped += '\\\\';
        else if (char === '"') escaped += '\\"';
        else if (char === '\n') escaped += '\\n';
        else if (char === '\r') escaped += '\\r';
        else if (char === '\t') escaped += '\\t';
        else if (code < 32) escaped += `\\${code}`;
        else escaped += char;
    }
    return `"${escaped}"`;
}

function luaKey(key: string): string {
    return IDENTIFIER.test(key) ? key : `[${luaString(key)}]`;
}

function isFlat(value: JsonValue): boolean {
    if (Array.isArray(value)) return value.every(entry => typeof entry !== 'object' || entry === null);
    if (isJsonObject(value)) return Object.values(value).every(entry => typeof entry !== 'object' || entry === null);
    return true;
}

/**
 * Lua table constructor for a JSON value. Tables holding only scalars stay on
 * one line, anything nested is laid out one entry per line.
 */
export function toLuaLiteral(value: JsonValue, level = 0): string {
    if (value === null) return 'nil';
    if (typeof value === 'string') return luaString(value);
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);

    const entries = Array.isArray(value)
        ? value.map(entry => toLuaLiteral(entry, level + 1))
        : Object.entries(value).map(([key, entry]) => `${luaKey(key)} = ${toLuaLiteral(entry, level + 1)}`);

    if (entries.length === 0) return '{}';
    if (isFlat(value)) return `{${entries.join(', ')}}`;

    return `{\n${entries.map(entry => pad(level + 1) + entry).join(',\n')}\n${pad(level)}}`;
}

export class LuaPatchRenderer {
    render(plan: PatchPlan, fixes: string[], packages: string[]): string {
        const header = [
            `-- Compatibility patch for ${plan.target}`,
            `-- Fixes: ${fixes.join(', ')}`,
            `-- Packages: ${packages.join(', ')}`,
            ''
        ];

        let body: string[];
        switch (plan.kind) {
            case 'recipe-variants':
                body = this.renderRecipes(plan);
                break;
            case 'technology-paths':
                body = this.renderTechnologies(plan);
                break;
            case 'generic-variants':
                body = this.renderGeneric(plan);
                break;
        }

        return [...header, ...body].join('\n') + '\n';
    }

    recipeDefinition(recipeName: string, variant: RecipeVariant): JsonObject {
        const definition: JsonObject = {
            type: 'recipe',
            name: variant.name,
            localised_name: [`recipe-name.${recipeName}`]
        };
        if (variant.category !== undefined) definition.category = variant.category;
        if (variant.energyRequired !== undefined) definition.energy_required = variant.energyRequired;
        definition.enabled = variant.enabled;
        definition.ingredients = ingredientsToJson(variant.ingredients);
        definition.results = ingredientsToJson(variant.results);
        return definition;
    }

    technologyDefinition(technologyName: string, alternative: TechnologyAlternative): JsonObject {
        return {
            type: 'technology',
            name: alternative.name,
            localised_name: [`technology-name.${technologyName}`],
            prerequisites: alternative.prerequisites,
            unit: unitToLua(alternative.unit),
            effects: alternative.effects
        };
    }

    private renderRecipes(plan: RecipeVariantPlan): string[] {
        const definitions = plan.variants.map(variant => this.recipeDefinition(plan.recipeName, variant));
        return [
            `if data.raw.recipe[${luaString(plan.recipeName)}] then`,
            `${pad(1)}data:extend(${toLuaLiteral(definitions, 1)})`,
            'end'
        ];
    }

    private renderTechnologies(plan: TechnologyPathPlan): string[] {
        const lines = [`if data.raw.technology[${luaString(plan.technologyName)}] then`];

        for (const alternative of [...plan.alternatives, ...plan.fallbacks]) {
            const label = alternative.tier ? `fallback tier ${alternative.tier}` : `path from ${alternative.package ?? 'unknown'}`;
            lines.push(`${pad(1)}-- ${alternative.name}: ${label}`);

            const definition = this.technologyDefinition(plan.technologyName, alternative);
            if (alternative.requires.length === 0) {
                lines.push(`${pad(1)}data:extend(${toLuaLiteral([definition], 1)})`);
                continue;
            }

            const guard = alternative.requires
                .map(name => `data.raw.technology[${luaString(name)}]`)
                .join(' and ');
            lines.push(
                `${pad(1)}if ${guard} then`,
                `${pad(2)}data:extend(${toLuaLiteral([definition], 2)})`,
                `${pad(1)}end`
            );
        }

        lines.push('end');
        return lines;
    }

    private renderGeneric(plan: GenericVariantPlan): string[] {
        const lines = [`if data.raw[${luaString(plan.prototypeKind)}][${luaString(plan.prototypeName)}] then`];

        for (const variant of plan.variants) {
            const definitions: JsonObject[] = [{ type: plan.prototypeKind, name: variant.name, ...variant.fields }];
            if (variant.recipe) {
                definitions.push(this.recipeDefinition(variant.recipe.source, variant.recipe));
            }
            lines.push(
                `${pad(1)}-- ${variant.variant} variant (x${variant.multiplier})`,
                `${pad(1)}data:extend(${toLuaLiteral(definitions, 1)})`
            );
        }

        lines.push('end');
        return lines;
    }
}

// Research units are written with `{name, amount}` pairs.
function unitToLua(unit: JsonValue): JsonValue {
    if (!isJsonObject(unit)) return unit;
    const ingredients = readIngredients(unit.ingredients);
    if (ingredients.length === 0) return unit;
    return { ...unit, ingredients: ingredients.map(ingredient => [ingredient.name, ingredient.amount]) };
}
