import { readdir, readFile, stat } from 'fs/promises';
import { basename, join } from 'path';
import { z } from 'zod';
import { DEFAULT_ANALYSIS_CONFIG } from './config.js';
import { logger } from './logger.js';
import type { ConflictIssue, PackageDependency, PackageDependencyKind, PackageInfo, Severity } from './types.js';

const InfoJsonSchema = z.object({
    name: z.string().min(1),
    version: z.string().min(1),
    title: z.string().optional(),
    author: z.string().optional(),
    dependencies: z.array(z.string()).optional()
}).passthrough();

const PREFIXES: Array<[string, PackageDependencyKind]> = [
    ['(?)', 'hidden-optional'],
    ['!', 'incompatible'],
    ['?', 'optional'],
    ['~', 'no-load-order']
];

const VERSION_CONSTRAINT = /^(.+?)\s*(<=|>=|<|>|=)\s*(\S+)$/;

/** Parses entries such as `base >= 1.1`, `? other-mod`, `! broken-mod`. */
export function parseDependency(entry: string): PackageDependency | null {
    let rest = entry.trim();
    let kind: PackageDependencyKind = 'required';

    for (const [prefix, prefixKind] of PREFIXES) {
        if (rest.startsWith(prefix)) {
            kind = prefixKind;
            rest = rest.slice(prefix.length).trim();
            break;
        }
    }

    const match = VERSION_CONSTRAINT.exec(rest);
    if (match) {
        const [, name, operator, version] = match;
        if (operator === '<' || operator === '<=' || operator === '=' || operator === '>=' || operator === '>') {
            return { name: name.trim(), kind, operator, version };
        }
    }

    return rest ? { name: rest, kind } : null;
}

export function compareVersions(a: string, b: string): number {
    const left = a.split('.').map(part => parseInt(part, 10) || 0);
    const right = b.split('.').map(part => parseInt(part, 10) || 0);
    for (let i = 0; i < Math.max(left.length, right.length); i++) {
        const diff = (left[i] ?? 0) - (right[i] ?? 0);
        if (diff !== 0) return diff;
    }
    return 0;
}

export function satisfiesVersion(version: string, dependency: PackageDependency): boolean {
    if (!dependency.operator || dependency.version === undefined) return true;
    const diff = compareVersions(version, dependency.version);
    switch (dependency.operator) {
        case '<': return diff < 0;
        case '<=': return diff <= 0;
        case '=': return diff === 0;
        case '>=': return diff >= 0;
        case '>': return diff > 0;
    }
}

function byName(a: string, b: string): number {
    const lower = a.toLowerCase().localeCompare(b.toLowerCase());
    return lower !== 0 ? lower : a.localeCompare(b);
}

export class ModLoader {
    constructor(
        private readonly basePackages: string[] = DEFAULT_ANALYSIS_CONFIG.basePackages,
        private readonly batchSize: number = 10
    ) {}

    async loadPackages(modsPath: string): Promise<PackageInfo[]> {
        if (!await this.pathExists(modsPath)) {
            logger.error(`Mods directory not found: ${modsPath}`);
            return [];
        }

        logger.info(`Scanning for packages in: ${modsPath}`);
        const entries = await readdir(modsPath, { withFileTypes: true });
        const tasks: Array<() => Promise<PackageInfo | null>> = [];

        for (const entry of entries) {
            const packagePath = join(modsPath, entry.name);
            if (entry.isDirectory()) {
                tasks.push(() => this.loadPackageInfo(packagePath));
            } else if (entry.name.endsWith('.zip')) {
                logger.warn(`Skipping zipped package ${entry.name}: extract it to analyze`);
            }
        }

        const results = await this.processInBatches(tasks, this.batchSize);
        const packages = new Map<string, PackageInfo>();
        for (const info of results) {
            if (!info) continue;
            if (packages.has(info.name)) {
                logger.warn(`Duplicate package ${info.name} at ${info.path}; keeping the first`);
                continue;
            }
            packages.set(info.name, info);
        }

        const loaded = Array.from(packages.values()).sort((a, b) => byName(a.name, b.name));
        logger.info(`Discovery complete. Found ${loaded.length} packages`);
        return loaded;
    }

    async loadPackageInfo(packagePath: string): Promise<PackageInfo | null> {
        const infoPath = join(packagePath, 'info.json');
        if (!await this.pathExists(infoPath)) {
            logger.debug(`No info.json in ${packagePath}`);
            return null;
        }

        try {
            const parsed = InfoJsonSchema.safeParse(JSON.parse(await readFile(infoPath, 'utf-8')));
            if (!parsed.success) {
                const details = parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
                logger.warn(`Invalid info.json in ${packagePath}: ${details.join('; ')}`);
                return null;
            }

            const info = parsed.data;
            const dependencies: PackageDependency[] = [];
            for (const entry of info.dependencies ?? []) {
                const dependency = parseDependency(entry);
                if (dependency) dependencies.push(dependency);
            }

            logger.debug(`Parsed package ${info.name} v${info.version}`);
            return {
                name: info.name,
                version: info.version,
                title: info.title ?? info.name,
                author: info.author,
                path: packagePath,
                isBase: this.basePackages.includes(info.name),
                dependencies
            };
        } catch (error) {
            logger.warn(`Failed to load info.json for ${basename(packagePath)}`, {
                error: error instanceof Error ? error.message : String(error)
            });
            return null;
        }
    }

    /**
     * Base packages first, then dependencies before dependents, ties broken
     * alphabetically. Packages caught in a dependency cycle go last.
     */
    resolveLoadOrder(packages: PackageInfo[]): string[] {
        const names = new Set(packages.map(info => info.name));
        const order = this.basePackages.filter(name => names.has(name));
        const placed = new Set(order);

        const pending = new Map<string, Set<string>>();
        for (const info of packages) {
            if (placed.has(info.name)) continue;
            const waitsFor = new Set<string>();
            for (const dependency of info.dependencies) {
                if (dependency.kind === 'incompatible' || dependency.kind === 'no-load-order') continue;
                if (names.has(dependency.name) && !placed.has(dependency.name) && dependency.name !== info.name) {
                    waitsFor.add(dependency.name);
                }
            }
            pending.set(info.name, waitsFor);
        }

        while (pending.size > 0) {
            const ready = Array.from(pending.entries())
                .filter(([, waitsFor]) => waitsFor.size === 0)
                .map(([name]) => name)
                .sort(byName);

            if (ready.length === 0) {
                const cyclic = Array.from(pending.keys()).sort(byName);
                logger.warn(`Dependency cycle between packages: ${cyclic.join(', ')}`);
                order.push(...cyclic);
                break;
            }

            const next = ready[0];
            order.push(next);
            pending.delete(next);
            for (const waitsFor of pending.values()) {
                waitsFor.delete(next);
            }
        }

        return order;
    }

    validatePackages(packages: PackageInfo[]): ConflictIssue[] {
        const installed = new Map(packages.map(info => [info.name, info]));
        const issues: ConflictIssue[] = [];

        for (const info of packages) {
            for (const dependency of info.dependencies) {
                const target = installed.get(dependency.name);

                if (dependency.kind === 'incompatible') {
                    if (target) {
                        issues.push(packageIssue('PACKAGE_INCOMPATIBLE', info.name, dependency.name, 'critical', {
                            title: `Incompatible Packages: ${info.name} / ${dependency.name}`,
                            description: `${info.name} is incompatible with ${dependency.name}`,
                            rootCause: `${info.name} declares ${dependency.name} as incompatible`,
                            suggestedFixes: ['Disable one of these packages'],
                            packages: [info.name, dependency.name]
                        }));
                    }
                    continue;
                }

                if (!target) {
                    if (dependency.kind === 'required') {
                        issues.push(packageIssue('PACKAGE_DEPENDENCY', info.name, dependency.name, 'critical', {
                            title: `Missing Package: ${dependency.name}`,
                            description: `${info.name} requires ${dependency.name} which is not installed`,
                            rootCause: `Required dependency ${dependency.name} is not loaded`,
                            suggestedFixes: [`Install and enable ${dependency.name}`],
                            packages: [info.name]
                        }));
                    }
                    continue;
                }

                if (!satisfiesVersion(target.version, dependency)) {
                    const constraint = `${dependency.operator ?? ''} ${dependency.version ?? ''}`.trim();
                    issues.push(packageIssue('PACKAGE_VERSION', info.name, dependency.name,
                        dependency.kind === 'required' ? 'high' : 'medium', {
                            title: `Version Mismatch: ${dependency.name}`,
                            description: `${info.name} needs ${dependency.name} ${constraint} but ${target.version} is installed`,
                            rootCause: `Installed ${dependency.name} ${target.version} does not satisfy ${constraint}`,
                            suggestedFixes: [`Install a version of ${dependency.name} matching ${constraint}`],
                            packages: [info.name, dependency.name]
                        }));
                }
            }
        }

        if (issues.length > 0) {
            logger.warn(`Package validation found ${issues.length} issues`);
        }
        return issues;
    }

    /** Names each package depends on for load order, keyed by package. */
    dependencyMap(packages: PackageInfo[]): Record<string, string[]> {
        const map: Record<string, string[]> = {};
        for (const info of packages) {
            map[info.name] = info.dependencies
                .filter(dependency => dependency.kind !== 'incompatible')
                .map(dependency => dependency.name);
        }
        return map;
    }

    private async processInBatches<T>(tasks: Array<() => Promise<T>>, batchSize: number): Promise<T[]> {
        const results: T[] = [];

        for (let i = 0; i < tasks.length; i += batchSize) {
            const batch = tasks.slice(i, i + batchSize).map(task => task());
            const batchResults = await Promise.allSettled(batch);

            for (const result of batchResults) {
                if (result.status === 'fulfilled') {
                    results.push(result.value);
                } else {
                    logger.warn('Package loading failed', {
                        error: result.reason instanceof Error ? result.reason.message : String(result.reason)
                    });
                }
            }
        }

        return results;
    }

    private async pathExists(path: string): Promise<boolean> {
        try {
            await stat(path);
            return true;
        } catch {
            return false;
        }
    }
}

interface PackageIssueText {
    title: string;
    description: string;
    rootCause: string;
    suggestedFixes: string[];
    packages: string[];
}

function packageIssue(
    prefix: string,
    packageName: string,
    dependencyName: string,
    severity: Severity,
    text: PackageIssueText
): ConflictIssue {
    return {
        issueId: `${prefix}:${packageName}->${dependencyName}`,
        detector: 'package',
        severity,
        title: text.title,
        description: text.description,
        affectedKeys: [],
        contributingPackages: text.packages,
        rootCause: text.rootCause,
        suggestedFixes: text.suggestedFixes,
        fieldPath: '',
        evidence: { package: packageName, dependency: dependencyName }
    };
}
