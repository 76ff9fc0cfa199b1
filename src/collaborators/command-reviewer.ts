/**
 * Command reviewer — an external reviewer backed by a shell command.
 *
 * The evidence package is written to stdin as JSON. Exit code 0 approves;
 * any other exit rejects, with the non-empty stdout lines as the reasons.
 *
 * Dependency direction: command-reviewer.ts → execa, collaborators/types
 * Used by: collaborator factory
 */

import { execa } from 'execa';
import { CollaboratorError } from '../core/errors.js';
import type { EvidencePackage, ExternalReviewer, ReviewVerdict } from './types.js';

export class CommandReviewer implements ExternalReviewer {
    constructor(
        private readonly command: string,
        private readonly cwd: string,
    ) {}

    async review(pkg: EvidencePackage): Promise<ReviewVerdict> {
        const result = await execa(this.command, {
            shell: true,
            cwd: this.cwd,
            input: JSON.stringify(pkg),
            reject: false,
            env: { FORCE_COLOR: '0', STAGEGATE_STAGE: pkg.stage, STAGEGATE_RUN_ID: pkg.runId },
        });

        if (result.exitCode === undefined) {
            throw new CollaboratorError(`Reviewer command could not start: ${this.command}`, {
                command: this.command,
                stderr: result.stderr,
            });
        }

        if (result.exitCode === 0) {
            return { approved: true, reasons: [] };
        }

        const reasons = result.stdout
            .split('\n')
            .map((line) => line.trim())
            .filter((line) => line.length > 0);
        return { approved: false, reasons: reasons.length > 0 ? reasons : [`reviewer exited with code ${result.exitCode}`] };
    }
}
