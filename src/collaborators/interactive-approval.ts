/**
 * Human approval — interactive terminal prompts.
 *
 * Used for the plan approval after PLAN and, when configured, as the
 * external reviewer at DISRUPT and VALIDATE. Both wait for an answer
 * with no timeout of their own.
 *
 * Dependency direction: interactive-approval.ts → prompts, chalk
 * Used by: collaborator factory
 */

import prompts from 'prompts';
import chalk from 'chalk';
import { dataOfKind } from '../core/records/codec.js';
import type { EvidencePackage, ExternalReviewer, PlanApprover, PlanResult, ReviewVerdict } from './types.js';

/** Asks the user to approve the plan. A dismissed prompt counts as a rejection. */
export class InteractivePlanApprover implements PlanApprover {
    async approve(plan: PlanResult, objective: string): Promise<boolean> {
        console.log();
        console.log(chalk.bold.cyan('── Plan ──'));
        console.log(chalk.gray(`Objective: ${objective}`));
        console.log();

        for (const task of plan.tasks) {
            const deps = task.metadata.blocked_by.length > 0 ? chalk.gray(` ← ${task.metadata.blocked_by.join(', ')}`) : '';
            console.log(`  ${chalk.white(task.id)} ${chalk.yellow(`[${task.metadata.current_stage}]`)} ${task.content}${deps}`);
        }
        console.log();

        const { decision } = await prompts({
            type: 'select',
            name: 'decision',
            message: 'Approve this plan?',
            choices: [
                { title: chalk.green('✔ Approve') + ' — continue to REVIEW', value: 'approve' },
                { title: chalk.red('✘ Reject') + ' — abort the run', value: 'reject' },
            ],
            initial: 0,
        });

        return decision === 'approve';
    }
}

/** Shows the evidence package and asks the user for a verdict. */
export class InteractiveReviewer implements ExternalReviewer {
    async review(pkg: EvidencePackage): Promise<ReviewVerdict> {
        console.log();
        console.log(chalk.bold.cyan(`── ${pkg.stage} review ──`));
        console.log(chalk.gray(`Objective: ${pkg.objective}`));

        const evidence = dataOfKind(pkg.records, 'evidence');
        for (const item of evidence) {
            const mark = item.verified ? chalk.green('✔') : chalk.gray('○');
            console.log(`  ${mark} ${item.id}: ${item.claim} ${chalk.gray(`(${item.location})`)}`);
        }
        console.log();

        const { approved } = await prompts({
            type: 'confirm',
            name: 'approved',
            message: `Approve ${pkg.stage}?`,
            initial: false,
        });

        if (approved === true) {
            return { approved: true, reasons: [] };
        }

        const { reason } = await prompts({
            type: 'text',
            name: 'reason',
            message: 'Reason for rejection',
        });

        return { approved: false, reasons: typeof reason === 'string' && reason.trim() ? [reason.trim()] : [] };
    }
}
