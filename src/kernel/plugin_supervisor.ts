import { EventBus } from './event_bus';
import { AppConfig, AppConfigInput, resolveConfig } from './config';

export interface PluginContext {
    eventBus: EventBus;
    config: AppConfig;
}

export interface Plugin {
    name: string;
    version: string;

    // Lifecycle methods
    init(context: PluginContext): Promise<void> | void;
    start(): Promise<void> | void;
    stop(): Promise<void> | void;
    destroy(): Promise<void> | void;
}

// ── Lifecycle ────────────────────────────────────────────────────────────────
//
//   CREATED ─initAll→ INITIALIZED ─startAll→ RUNNING ⇄ STOPPED
//   destroyAll() from any state → DESTROYED (terminal)
//
// Plugins are only registered while CREATED.  init/start run in registration
// order and stop at the first failure; stop/destroy run in reverse order and
// log failures without interrupting the rest.

export type SupervisorState = 'CREATED' | 'INITIALIZED' | 'RUNNING' | 'STOPPED' | 'DESTROYED';

type Phase = 'init' | 'start' | 'stop' | 'destroy';

/** Thrown when a PluginSupervisor method is called in the wrong state. */
export class LifecycleGateError extends Error {
    constructor(
        method: string,
        public readonly current: SupervisorState,
        public readonly allowed: readonly SupervisorState[],
    ) {
        super(`[Supervisor] ${method}() is not allowed while ${current} (expected ${allowed.join(' or ')})`);
        this.name = 'LifecycleGateError';
    }
}

export class PluginSupervisor {
    private readonly plugins = new Map<string, Plugin>();
    private readonly context: PluginContext;
    private state: SupervisorState = 'CREATED';

    /** Throws ConfigError when `config` fails validation. */
    constructor(config: AppConfigInput = {}, eventBus?: EventBus) {
        this.context = {
            eventBus: eventBus ?? new EventBus(),
            config: resolveConfig(config),
        };
    }

    public getEventBus(): EventBus {
        return this.context.eventBus;
    }

    public getConfig(): AppConfig {
        return this.context.config;
    }

    public getState(): SupervisorState {
        return this.state;
    }

    public getPlugin(name: string): Plugin | undefined {
        return this.plugins.get(name);
    }

    public registerPlugin(plugin: Plugin): void {
        this.gate(`registerPlugin('${plugin.name}')`, ['CREATED']);
        if (this.plugins.has(plugin.name)) {
            throw new Error(`[Supervisor] DUPLICATE PLUGIN: '${plugin.name}'`);
        }
        this.plugins.set(plugin.name, plugin);
        console.log(`[Supervisor] + ${plugin.name} v${plugin.version}`);
    }

    public async initAll(): Promise<void> {
        this.gate('initAll', ['CREATED']);
        await this.runPhase('init', this.inOrder(), true);
        this.state = 'INITIALIZED';
    }

    public async startAll(): Promise<void> {
        this.gate('startAll', ['INITIALIZED', 'STOPPED']);
        await this.runPhase('start', this.inOrder(), true);
        this.state = 'RUNNING';
        console.log(`[Supervisor] Running with ${this.plugins.size} plugin(s)`);
    }

    public async stopAll(): Promise<void> {
        this.gate('stopAll', ['RUNNING']);
        await this.runPhase('stop', this.inOrder().reverse(), false);
        this.state = 'STOPPED';
    }

    public async destroyAll(): Promise<void> {
        if (this.state === 'DESTROYED') {
            console.warn('[Supervisor] Already destroyed');
            return;
        }
        await this.runPhase('destroy', this.inOrder().reverse(), false);
        this.plugins.clear();
        this.state = 'DESTROYED';
    }

    // ── Private helpers ───────────────────────────────────────────────────────

    private gate(method: string, allowed: readonly SupervisorState[]): void {
        if (!allowed.includes(this.state)) {
            throw new LifecycleGateError(method, this.state, allowed);
        }
    }

    private inOrder(): Plugin[] {
        return Array.from(this.plugins.values());
    }

    private async runPhase(phase: Phase, order: readonly Plugin[], failFast: boolean): Promise<void> {
        for (const plugin of order) {
            try {
                await this.invoke(plugin, phase);
            } catch (error) {
                console.error(`[Supervisor] ${plugin.name} failed during ${phase}`, error);
                if (failFast) throw error;
            }
        }
    }

    private invoke(plugin: Plugin, phase: Phase): Promise<void> | void {
        switch (phase) {
            case 'init':
                return plugin.init(this.context);
            case 'start':
                return plugin.start();
            case 'stop':
                return plugin.stop();
            case 'destroy':
                return plugin.destroy();
        }
    }
}
