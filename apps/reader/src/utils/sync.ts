/**
 * Coalescing runner for a sync command.
 *
 * invalidate() starts the command if idle. Invalidations that arrive while it runs
 * collapse into exactly one follow-up run, so the command never overlaps itself.
 */
export class InvalidateSync {
    private _invalidated = false;
    private _invalidatedDouble = false;
    private _stopped = false;
    private _command: () => Promise<void>;
    private _onError: (error: unknown) => void;
    private _pendings: Array<() => void> = [];

    constructor(command: () => Promise<void>, opts: { onError: (error: unknown) => void }) {
        this._command = command;
        this._onError = opts.onError;
    }

    get isRunning(): boolean {
        return this._invalidated;
    }

    invalidate(): void {
        if (this._stopped) {
            return;
        }
        if (!this._invalidated) {
            this._invalidated = true;
            this._invalidatedDouble = false;
            void this._doSync();
        } else if (!this._invalidatedDouble) {
            this._invalidatedDouble = true;
        }
    }

    /**
     * Resolves once no run is scheduled or in flight anymore.
     */
    async invalidateAndAwait(): Promise<void> {
        if (this._stopped) {
            return;
        }
        await new Promise<void>((resolve) => {
            this._pendings.push(resolve);
            this.invalidate();
        });
    }

    async awaitQueue(): Promise<void> {
        if (this._stopped || !this._invalidated) {
            return;
        }
        await new Promise<void>((resolve) => {
            this._pendings.push(resolve);
        });
    }

    stop(): void {
        if (this._stopped) {
            return;
        }
        this._stopped = true;
        this._notifyPendings();
    }

    private _notifyPendings = () => {
        const pendings = this._pendings;
        this._pendings = [];
        for (const pending of pendings) {
            pending();
        }
    };

    private _doSync = async (): Promise<void> => {
        try {
            await this._command();
        } catch (error) {
            this._onError(error);
        }
        if (this._stopped) {
            this._notifyPendings();
            return;
        }
        if (this._invalidatedDouble) {
            this._invalidatedDouble = false;
            void this._doSync();
        } else {
            this._invalidated = false;
            this._notifyPendings();
        }
    };
}
