import { promises as fs } from 'fs';
import * as path from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { logger } from '@pulseboard/core';
import {
    DEFAULT_TEAM_TARGETS,
    TargetsFileSchema,
    TeamTargetsUpdateSchema,
    type TargetsFile,
    type TeamTargets,
} from './schemas.js';
import { TargetsError } from './errors.js';

export const DEFAULT_TARGETS_FILE = 'pulseboard-targets.yml';

type TeamOverride = TargetsFile['teams'][string];

// Not representable as a key of the YAML mapping once it is read back
const RESERVED_TEAM_NAMES = new Set(['__proto__']);

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Per-team targets persisted as YAML:
 *
 * ```yaml
 * teams:
 *   Growth:
 *     revenueTarget: 300000
 * ```
 *
 * Teams absent from the file, and fields absent for a team, take the defaults.
 */
export class TargetsStore {
    private overrides = new Map<string, TeamOverride>();

    constructor(private readonly filePath: string) {}

    static async open(filePath: string): Promise<TargetsStore> {
        const store = new TargetsStore(filePath);
        await store.load();
        return store;
    }

    getFilePath(): string {
        return this.filePath;
    }

    /**
     * Read overrides from disk. A missing file means no overrides.
     * @throws PulseboardValidationError if the file content is invalid
     */
    async load(): Promise<void> {
        let content: string;
        try {
            content = await fs.readFile(this.filePath, 'utf-8');
        } catch (error) {
            if (isMissingFile(error)) {
                logger.debug(`No targets file at ${this.filePath}, using defaults`);
                this.overrides = new Map();
                return;
            }
            throw TargetsError.fileReadError(
                this.filePath,
                error instanceof Error ? error.message : String(error)
            );
        }

        let raw: unknown;
        try {
            // An empty file parses to null
            raw = parseYaml(content) ?? {};
        } catch (error) {
            throw TargetsError.fileReadError(
                this.filePath,
                error instanceof Error ? error.message : String(error)
            );
        }

        const validation = TargetsFileSchema.safeParse(raw);
        if (!validation.success) {
            throw TargetsError.validationFailed(validation.error);
        }
        this.overrides = new Map(Object.entries(validation.data.teams));
        logger.debug(
            `Loaded targets for ${this.overrides.size} teams from ${this.filePath}`
        );
    }

    get(team: string): TeamTargets {
        return { ...DEFAULT_TEAM_TARGETS, ...this.overrides.get(team) };
    }

    /**
     * Targets for every given team, stored values over defaults.
     */
    resolve(teams: readonly string[]): Record<string, TeamTargets> {
        return Object.fromEntries(teams.map((team) => [team, this.get(team)]));
    }

    /**
     * Validate and merge a partial update for one team, then write the file.
     * @returns The team's full targets after the update
     */
    async update(team: string, input: unknown): Promise<TeamTargets> {
        if (team.trim() === '' || RESERVED_TEAM_NAMES.has(team)) {
            throw TargetsError.invalidTeam(team);
        }
        const validation = TeamTargetsUpdateSchema.safeParse(input);
        if (!validation.success) {
            throw TargetsError.validationFailed(validation.error);
        }

        this.overrides.set(team, { ...this.overrides.get(team), ...validation.data });
        await this.persist();
        logger.info(`Updated targets for ${team}`);
        return this.get(team);
    }

    /**
     * Write full default targets for teams that have none yet.
     * @returns The teams that were added
     */
    async initialize(teams: readonly string[]): Promise<string[]> {
        const added = teams.filter(
            (team) => !this.overrides.has(team) && !RESERVED_TEAM_NAMES.has(team)
        );
        for (const team of added) {
            this.overrides.set(team, { ...DEFAULT_TEAM_TARGETS });
        }
        await this.persist();
        return added;
    }

    async persist(): Promise<void> {
        try {
            await fs.mkdir(path.dirname(this.filePath), { recursive: true });
            const yamlContent = stringifyYaml(
                { teams: Object.fromEntries(this.overrides) },
                { indent: 2, lineWidth: 100, minContentWidth: 20 }
            );
            await fs.writeFile(this.filePath, yamlContent, 'utf-8');
            logger.debug(`Saved targets to ${this.filePath}`);
        } catch (error) {
            throw TargetsError.fileWriteError(
                this.filePath,
                error instanceof Error ? error.message : String(error)
            );
        }
    }
}
