import { spawnSync, type ChildProcess } from 'node:child_process';
import { logger } from '../core/logger.js';

export const DEFAULT_KILL_GRACE_MS = 2000;

function signalChild(child: ChildProcess, signal: NodeJS.Signals) {
    const pid = child.pid;
    if (pid !== undefined && process.platform !== 'win32') {
        try {
            // children are spawned detached, so the negative pid reaches the whole group
            process.kill(-pid, signal);
        } catch (error) {
            logger.debug('process: group signal failed', { pid, signal, error: String(error) });
        }
    }
    try {
        child.kill(signal);
    } catch (error) {
        logger.debug('process: signal failed', { pid, signal, error: String(error) });
    }
}

function hasExited(child: ChildProcess) {
    return child.exitCode !== null || child.signalCode !== null;
}

/**
 * Asks a child (and its process group) to stop with SIGTERM, then sends
 * SIGKILL if it is still alive after `graceMs`.
 */
export function terminateProcessTree(child: ChildProcess, graceMs = DEFAULT_KILL_GRACE_MS) {
    if (hasExited(child)) {
        return;
    }
    const pid = child.pid;
    if (pid !== undefined && process.platform === 'win32') {
        // taskkill must finish before we return, otherwise the tree outlives us
        const result = spawnSync('taskkill', ['/pid', pid.toString(), '/t', '/f'], { stdio: 'ignore' });
        if (result.status !== 0) {
            signalChild(child, 'SIGKILL');
        }
        return;
    }
    signalChild(child, 'SIGTERM');
    const timer = setTimeout(() => {
        if (!hasExited(child)) {
            logger.warn('process: child ignored SIGTERM, sending SIGKILL', { pid });
            signalChild(child, 'SIGKILL');
        }
    }, graceMs);
    timer.unref();
    child.once('exit', () => clearTimeout(timer));
}
