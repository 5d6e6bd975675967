export const MIN_NODE_MAJOR = 20;

export function isSupportedRuntime(version: string = process.versions.node): boolean {
    const major = Number.parseInt(version.replace(/^v/, '').split('.')[0] ?? '', 10);
    return Number.isFinite(major) && major >= MIN_NODE_MAJOR;
}
