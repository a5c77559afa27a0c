/**
 * Console output of the commands and the pipeline runner.
 */

export function log(message: string): void {
    console.log(message);
}

export function success(message: string): void {
    console.log(`✓ ${message}`);
}

export function warn(message: string): void {
    console.warn(`⚠️  ${message}`);
}

export function error(message: string): void {
    console.error(`✖ ${message}`);
}

export function arrow(message: string): void {
    console.log(`→ ${message}`);
}

export function info(message: string): void {
    console.info(`ℹ ${message}`);
}

/**
 * Announces a pipeline step, numbered from 1.
 */
export function stepStarted(index: number, total: number, name: string): void {
    log(`\n→ Step ${index + 1}/${total}: ${name}...`);
}

export function stepFailed(name: string): void {
    console.error(`\n✖ Fatal error in step "${name}". Skipping to final steps.`);
}
