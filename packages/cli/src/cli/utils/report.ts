import boxen from 'boxen';
import chalk from 'chalk';
import { itemLabel, type RunSummary, type TransferResult } from '@neurobik/core';

export function renderBanner(): string {
    return boxen(chalk.bold('🚀 Downloads Starting...'), {
        padding: { top: 0, bottom: 0, left: 4, right: 4 },
        margin: { top: 1, bottom: 1, left: 0, right: 0 },
        borderStyle: 'round',
        borderColor: 'cyan',
        textAlignment: 'center',
    });
}

export function formatResultLine(result: TransferResult): string {
    const label = itemLabel(result.item);
    switch (result.status) {
        case 'success':
            return chalk.green(`✓ ${label}`);
        case 'skipped':
            return chalk.gray(`- ${label} (already complete)`);
        case 'failed':
            return chalk.red(`✗ ${label}: ${result.error.message}`);
    }
}

export function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    const units = ['KB', 'MB', 'GB', 'TB'];
    let value = bytes / 1024;
    let unit = 0;
    while (value >= 1024 && unit < units.length - 1) {
        value /= 1024;
        unit++;
    }
    return `${value.toFixed(1)} ${units[unit]}`;
}

/**
 * Report lines for a finished run, in processing order.
 */
export function summaryLines(summary: RunSummary): string[] {
    const lines = summary.results.map(formatResultLine);
    const failed = summary.results.filter((r) => r.status === 'failed').length;
    const succeeded = summary.results.filter((r) => r.status === 'success').length;

    lines.push('');
    lines.push(
        failed > 0
            ? chalk.yellow(`${succeeded} completed, ${failed} failed`)
            : chalk.green(`${succeeded} completed`)
    );

    if (summary.defaultModel) {
        lines.push(`Default model: ${summary.defaultModel.path}`);
    }
    if (summary.defaultLinkError) {
        lines.push(chalk.yellow(`Default model link not updated: ${summary.defaultLinkError.message}`));
    }
    return lines;
}

export function renderSummary(summary: RunSummary): string {
    const failed = summary.results.some((r) => r.status === 'failed');
    return boxen(summaryLines(summary).join('\n'), {
        title: 'Summary',
        padding: 1,
        borderStyle: 'round',
        borderColor: failed ? 'yellow' : 'green',
    });
}
