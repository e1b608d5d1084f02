import { BeforeApplicationShutdown, Inject, Injectable, OnApplicationBootstrap, Optional } from "@nestjs/common";
import type {
  BrokerPosition,
  ControlCommand,
  DaemonConfig,
  DaemonState,
  HedgeState,
  StatusSnapshot,
  TradingState
} from "@gammahedge/shared";
import { defaultDaemonConfig, STATUS_VERSION, summarizeConfig } from "@gammahedge/shared";
import type { Logger } from "pino";

import { withBrokerTimeout } from "../broker/broker-call";
import { BROKER_PORT, type BrokerEvent, type BrokerPort, type Quote } from "../broker/broker.port";
import { ConfigService } from "../config/config.service";
import { ControlChannelService } from "../control/control-channel.service";
import { HedgeExecutor, type ExecutionOutcome, type ExecutorSettings } from "../execution/hedge-executor";
import { DaemonFsm } from "../fsm/daemon-fsm";
import type { TradingEvent } from "../fsm/events";
import { HedgeFsm } from "../fsm/hedge-fsm";
import { TradingFsm, type TradingPolicy } from "../fsm/trading-fsm";
import { ExecutionGuard } from "../hedging/execution-guard";
import { applyHedgeGates, shouldOutputTarget } from "../hedging/hedge-gate";
import { buildHedgeIntent } from "../hedging/hedge-intent";
import { PINO_LOGGER } from "../logging/pino-logger";
import { aggregateGreeks, selectStructureLegs, stockSharesOf, type LegGreeks } from "../positions/positions";
import { STATUS_SINK, type StatusSink } from "../sink/status-sink";
import { ClassificationError, classify } from "../state/classifier";
import { degradeCompositeState, dimensionsOf, type CompositeState } from "../state/composite-state";
import { evaluateTradingGuards, type TradingGuards } from "../state/trading-guards";
import { DAEMON_CLOCK, type Clock } from "./daemon.tokens";
import { deriveSelfCheck } from "./self-check";

// Upper bound on TradingFSM steps per cycle (BOOT → SYNC → IDLE → ARMED → MONITOR → band state).
const MAX_TRADING_STEPS = 8;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

@Injectable()
export class DaemonService implements OnApplicationBootstrap, BeforeApplicationShutdown {
  private readonly daemonFsm: DaemonFsm;
  private readonly tradingFsm: TradingFsm;
  private readonly hedgeFsm: HedgeFsm;
  private readonly guard: ExecutionGuard;
  private readonly executor: HedgeExecutor;

  private config: DaemonConfig;
  private readonly brokerEvents: BrokerEvent[] = [];
  private pendingOutcomes: ExecutionOutcome[] = [];
  private unsubscribeBroker: (() => void) | null = null;

  private cycleInFlight = false;
  private hostShutdown = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;
  private resolveStopped: () => void = () => undefined;
  private readonly stopped: Promise<void>;

  private nextReconnectAtMs = 0;
  private lastHeartbeatMs: number | null = null;
  private positions: BrokerPosition[] = [];
  private positionsSynced = false;
  private quote: Quote | null = null;
  private lastQuoteTs: number | null = null;
  private priceHistory: number[] = [];
  private lastComposite: CompositeState | null = null;
  private lastGateReason: string | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly controlChannel: ControlChannelService,
    @Inject(BROKER_PORT) private readonly broker: BrokerPort,
    @Inject(STATUS_SINK) private readonly sink: StatusSink,
    @Inject(PINO_LOGGER) private readonly logger: Logger,
    @Optional() @Inject(DAEMON_CLOCK) private readonly now: Clock = Date.now
  ) {
    this.config = this.loadInitialConfig();
    this.daemonFsm = new DaemonFsm(logger.child({ fsm: "daemon" }));
    this.tradingFsm = new TradingFsm(logger.child({ fsm: "trading" }));
    this.hedgeFsm = new HedgeFsm(logger.child({ fsm: "hedge" }), now);
    this.guard = new ExecutionGuard(logger.child({ component: "execution-guard" }), now);
    this.executor = new HedgeExecutor(this.hedgeFsm, broker, sink, logger.child({ component: "executor" }), now);
    this.stopped = new Promise<void>((resolve) => {
      this.resolveStopped = resolve;
    });
    this.unsubscribeBroker = broker.subscribe((event) => {
      this.brokerEvents.push(event);
      this.wakeUp();
    });
  }

  onApplicationBootstrap(): void {
    if (process.env.DAEMON_AUTOSTART === "false") {
      this.logger.info({ msg: "Daemon autostart disabled" });
      return;
    }
    this.start();
  }

  async beforeApplicationShutdown(): Promise<void> {
    this.hostShutdown = true;
    if (!this.loop) return;
    this.controlChannel.enqueue("stop");
    await this.loop;
  }

  get state(): { daemon: DaemonState; trading: TradingState; hedge: HedgeState } {
    return { daemon: this.daemonFsm.current, trading: this.tradingFsm.current, hedge: this.hedgeFsm.current };
  }

  get compositeState(): CompositeState | null {
    return this.lastComposite;
  }

  isLoopRunning(): boolean {
    return this.loop !== null;
  }

  /** True once the application itself began shutting down, as opposed to a stop command. */
  isHostShutdown(): boolean {
    return this.hostShutdown;
  }

  whenStopped(): Promise<void> {
    return this.stopped;
  }

  start(): void {
    if (this.loop) return;

    this.controlChannel.onEnqueue(() => this.wakeUp());
    this.logger.info({ msg: "Daemon starting", summary: summarizeConfig(this.config) });

    this.loop = this.run()
      .catch((err) => {
        this.logger.error({ msg: "Daemon loop crashed", err: errorMessage(err) });
      })
      .finally(() => {
        this.unsubscribeBroker?.();
        this.unsubscribeBroker = null;
        this.controlChannel.onEnqueue(null);
        this.loop = null;
        this.resolveStopped();
      });
  }

  /** One evaluation cycle. Overlapping calls are dropped. */
  async runCycle(): Promise<void> {
    if (this.cycleInFlight) return;
    this.cycleInFlight = true;
    try {
      this.refreshConfig();
      await this.drainControl();
      await this.drainBrokerEvents();
      await this.handleState();
    } catch (err) {
      this.logger.error({ msg: "Daemon cycle failed; stopping", state: this.daemonFsm.current, err: errorMessage(err) });
      this.daemonFsm.requestStop();
    } finally {
      this.lastHeartbeatMs = this.now();
      this.writeStatus();
      this.cycleInFlight = false;
    }
  }

  private async run(): Promise<void> {
    while (this.daemonFsm.current !== "STOPPED") {
      const before = this.daemonFsm.current;
      await this.runCycle();

      const after = this.daemonFsm.current;
      if (after === "STOPPED") break;
      if (after === "STOPPING" || (after !== before && after !== "WAITING_IB")) continue;
      if (this.brokerEvents.length > 0 || this.controlChannel.pending() > 0) continue;

      await this.sleep(this.nextWaitMs());
    }
  }

  private nextWaitMs(): number {
    const heartbeat = this.config.daemon.heartbeatIntervalMs;
    if (this.daemonFsm.current !== "WAITING_IB") return heartbeat;
    return Math.max(0, Math.min(heartbeat, this.nextReconnectAtMs - this.now()));
  }

  private sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const timer = setTimeout(() => this.wakeUp(), ms);
      this.wake = () => {
        clearTimeout(timer);
        resolve();
      };
    });
  }

  private wakeUp(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private loadInitialConfig(): DaemonConfig {
    try {
      return this.configService.load();
    } catch (err) {
      this.logger.warn({ msg: "Config invalid at startup; using defaults", err: errorMessage(err) });
      return defaultDaemonConfig();
    }
  }

  private refreshConfig(): void {
    try {
      this.config = this.configService.load();
    } catch (err) {
      this.logger.warn({ msg: "Config reload failed; keeping last good snapshot", err: errorMessage(err) });
    }
  }

  private async drainControl(): Promise<void> {
    for (const { command } of this.controlChannel.drain()) {
      this.logger.info({ msg: "Control command", command, daemonState: this.daemonFsm.current });
      await this.applyCommand(command);
    }
  }

  private async applyCommand(command: ControlCommand): Promise<void> {
    switch (command) {
      case "stop":
        this.daemonFsm.requestStop();
        return;
      case "flatten":
        await this.executor.cancelInFlight("flatten", this.executorSettings());
        this.daemonFsm.requestStop();
        return;
      case "suspend":
        if (this.daemonFsm.current === "RUNNING") this.daemonFsm.transition("RUNNING_SUSPENDED");
        return;
      case "resume":
        if (this.daemonFsm.isSuspended()) this.daemonFsm.transition("RUNNING");
        if (this.daemonFsm.isRunning()) this.applyTradingEvent("manual_resume");
        return;
      case "retry_broker":
        if (this.daemonFsm.current === "WAITING_IB") this.daemonFsm.transition("CONNECTING");
        return;
    }
  }

  private async drainBrokerEvents(): Promise<void> {
    const events = this.brokerEvents.splice(0, this.brokerEvents.length);
    for (const event of events) {
      switch (event.kind) {
        case "quote":
          if (event.symbol === this.config.eligibility.symbol) this.quote = event.quote;
          break;
        case "connection":
          if (!event.connected) this.onBrokerLost("connection_lost");
          break;
        case "order": {
          const outcome = await this.executor.onOrderUpdate(event, this.executorSettings());
          if (outcome !== "pending") this.pendingOutcomes.push(outcome);
          break;
        }
      }
    }
  }

  private async handleState(): Promise<void> {
    switch (this.daemonFsm.current) {
      case "IDLE":
        this.daemonFsm.transition("CONNECTING");
        return;
      case "CONNECTING":
        await this.connectBroker();
        return;
      case "WAITING_IB":
        if (this.now() >= this.nextReconnectAtMs) {
          this.daemonFsm.transition("CONNECTING");
          await this.connectBroker();
        }
        return;
      case "CONNECTED":
        this.daemonFsm.transition("RUNNING");
        await this.evaluate(true);
        return;
      case "RUNNING":
      case "RUNNING_SUSPENDED":
        if (!this.broker.isConnected()) {
          this.onBrokerLost("not_connected");
          return;
        }
        await this.evaluate(false);
        return;
      case "STOPPING":
        await this.shutdown();
        return;
      case "STOPPED":
        return;
    }
  }

  private async connectBroker(): Promise<void> {
    let connected = false;
    try {
      connected = await withBrokerTimeout("connect", this.broker.connect(), this.config.daemon.brokerTimeoutMs);
    } catch (err) {
      this.logger.warn({ msg: "Broker connect failed", err: errorMessage(err) });
    }

    if (connected) {
      this.hedgeFsm.setConnected(true);
      this.daemonFsm.transition("CONNECTED");
      return;
    }

    this.nextReconnectAtMs = this.now() + this.config.daemon.reconnectIntervalMs;
    this.daemonFsm.transition("WAITING_IB");
    this.logger.warn({ msg: "Broker unavailable; waiting", retryInMs: this.config.daemon.reconnectIntervalMs });
  }

  private onBrokerLost(reason: string): void {
    if (this.daemonFsm.isTerminating()) return;

    this.logger.warn({ msg: "Broker connection lost", reason, daemonState: this.daemonFsm.current });
    this.executor.onBrokerDown();
    this.positionsSynced = false;
    this.pendingOutcomes = [];
    this.applyTradingEvent("broker_down");
    this.nextReconnectAtMs = this.now() + this.config.daemon.reconnectIntervalMs;
    this.daemonFsm.brokerLost();
  }

  private async shutdown(): Promise<void> {
    const inFlight = this.executor.inFlightOrder();
    if (inFlight) {
      this.logger.warn({ msg: "Stopping with hedge order in flight", inFlight });
    }
    try {
      await withBrokerTimeout("disconnect", this.broker.disconnect(), this.config.daemon.brokerTimeoutMs);
    } catch (err) {
      this.logger.warn({ msg: "Broker disconnect failed", err: errorMessage(err) });
    }
    this.daemonFsm.transition("STOPPED");
  }

  private async evaluate(reconnected: boolean): Promise<void> {
    const config = this.config;
    const nowMs = this.now();

    this.guard.rollDay(nowMs);
    const breakerTripped = await this.refreshBrokerData(config);
    if (!this.broker.isConnected()) {
      this.onBrokerLost("refresh_failed");
      return;
    }

    if (breakerTripped) {
      const pulled = await this.executor.riskTrip(this.executorSettings());
      if (pulled !== "pending") this.pendingOutcomes.push(pulled);
    }

    const housekeeping = await this.executor.checkTimeouts(this.executorSettings());
    if (housekeeping !== "pending") this.pendingOutcomes.push(housekeeping);

    const cs = await this.classifyCycle(config, nowMs);
    this.lastComposite = cs;

    for (const outcome of this.pendingOutcomes.splice(0, this.pendingOutcomes.length)) {
      this.applyTradingEvent(outcome === "done" ? "hedge_done" : "hedge_failed");
    }
    this.stepTradingFsm(reconnected ? "broker_up" : null);

    this.lastGateReason = null;
    if (this.tradingFsm.current === "NEED_HEDGE" && !this.daemonFsm.isSuspended()) {
      await this.tryHedge(cs, config);
    }
  }

  /** Pulls positions, quote and P&L. Returns true when the P&L just tripped the loss breaker. */
  private async refreshBrokerData(config: DaemonConfig): Promise<boolean> {
    const timeoutMs = config.daemon.brokerTimeoutMs;
    try {
      const positions = await withBrokerTimeout("getPositions", this.broker.getPositions(), timeoutMs);
      const quote = await withBrokerTimeout("getQuote", this.broker.getQuote(config.eligibility.symbol), timeoutMs);
      const dailyPnl = await withBrokerTimeout("getDailyPnl", this.broker.getDailyPnl(), timeoutMs);

      this.positions = positions;
      this.positionsSynced = true;
      this.quote = quote;
      this.recordPrice(quote, config.daemon.priceWindow);
      return this.guard.observeDailyPnl(dailyPnl, config);
    } catch (err) {
      this.positionsSynced = false;
      this.logger.warn({ msg: "Broker refresh failed", err: errorMessage(err) });
      return false;
    }
  }

  private recordPrice(quote: Quote | null, window: number): void {
    if (!quote || quote.ts === null || quote.ts === this.lastQuoteTs) return;
    const price = quote.bid !== null && quote.ask !== null ? (quote.bid + quote.ask) / 2 : quote.last;
    if (price === null || !Number.isFinite(price) || price <= 0) return;

    this.lastQuoteTs = quote.ts;
    this.priceHistory.push(price);
    if (this.priceHistory.length > window) {
      this.priceHistory.splice(0, this.priceHistory.length - window);
    }
  }

  private async fetchLegGreeks(contractIds: readonly string[]): Promise<Map<string, LegGreeks | null>> {
    const out = new Map<string, LegGreeks | null>();
    for (const contractId of contractIds) {
      try {
        out.set(contractId, await withBrokerTimeout("getGreeks", this.broker.getGreeks(contractId), this.config.daemon.brokerTimeoutMs));
      } catch (err) {
        this.logger.warn({ msg: "Greeks request failed", contractId, err: errorMessage(err) });
        out.set(contractId, null);
      }
    }
    return out;
  }

  private async classifyCycle(config: DaemonConfig, nowMs: number): Promise<CompositeState> {
    const { eligibility } = config;
    const quote = this.quote;
    const spot = quote && quote.bid !== null && quote.ask !== null ? (quote.bid + quote.ask) / 2 : (quote?.last ?? null);

    const legs = selectStructureLegs(this.positions, spot, eligibility, nowMs);
    const greeksByContract = await this.fetchLegGreeks(legs.map((leg) => leg.contractId));
    const guardState = this.guard.snapshot();
    const execution = {
      state: this.hedgeFsm.effectiveExecutionState(),
      circuitBreaker: guardState.circuitBreaker,
      lastHedgeTs: guardState.lastHedgeTs,
      lastHedgePrice: guardState.lastHedgePrice
    };

    try {
      return classify(
        { legs, stockShares: stockSharesOf(this.positions, eligibility.symbol) },
        {
          bid: quote?.bid ?? null,
          ask: quote?.ask ?? null,
          last: quote?.last ?? null,
          lastTs: quote?.ts ?? null,
          eventLagMs: null,
          priceHistory: this.priceHistory,
          asOfMs: nowMs
        },
        aggregateGreeks(legs, greeksByContract),
        execution,
        config.classification
      );
    } catch (err) {
      if (!(err instanceof ClassificationError)) throw err;
      this.logger.warn({ msg: "Classification failed; holding previous state", field: err.field, received: err.received });
      return degradeCompositeState(this.lastComposite, execution.state, nowMs);
    }
  }

  private guardsFor(cs: CompositeState): TradingGuards {
    const current: CompositeState = { ...cs, E: this.hedgeFsm.effectiveExecutionState() };
    return evaluateTradingGuards(current, {
      config: this.config,
      brokerConnected: this.broker.isConnected(),
      positionsSynced: this.positionsSynced,
      hedgeRetries: this.executor.consecutiveFailures,
      dailyHedgeCount: this.guard.snapshot().dailyHedgeCount
    });
  }

  private get tradingPolicy(): TradingPolicy {
    return { safeRecovery: this.config.daemon.safeRecovery };
  }

  private applyTradingEvent(event: TradingEvent): void {
    const cs = this.lastComposite;
    if (!cs) return;
    this.tradingFsm.apply(event, this.guardsFor(cs), this.tradingPolicy);
  }

  /** Steps the TradingFSM with evaluation events until it settles. */
  private stepTradingFsm(firstEvent: TradingEvent | null): void {
    const cs = this.lastComposite;
    if (!cs) return;

    let event: TradingEvent | null = firstEvent;
    for (let step = 0; step < MAX_TRADING_STEPS; step += 1) {
      const state = this.tradingFsm.current;
      const next: TradingEvent = event ?? (state === "BOOT" ? "start" : state === "SYNC" ? "synced" : "tick");
      event = null;
      const transition = this.tradingFsm.apply(next, this.guardsFor(cs), this.tradingPolicy);
      if (!transition && next !== "broker_up") return;
    }
  }

  private async tryHedge(cs: CompositeState, config: DaemonConfig): Promise<void> {
    if (!shouldOutputTarget(cs)) {
      this.lastGateReason = "state_not_hedgeable";
      return;
    }

    const intent = buildHedgeIntent(cs, config.classification.delta.hedgeThreshold);
    if (!intent) {
      this.lastGateReason = "no_hedge_intent";
      return;
    }

    const decision = applyHedgeGates(intent, cs, this.guard, {
      settings: config,
      symbol: config.eligibility.symbol,
      orderType: config.broker.orderType,
      dailyPnl: this.guard.snapshot().dailyPnl
    });
    if (!decision.approved) {
      this.lastGateReason = decision.reason;
      this.logger.info({ msg: "Hedge blocked", reason: decision.reason, netDelta: cs.netDelta, D: cs.D });
      return;
    }

    this.applyTradingEvent("target_emitted");
    this.logger.info({ msg: "Hedge target emitted", order: decision.order, targetShares: decision.intent.targetShares });
    const outcome = await this.executor.submit(decision.order, decision.intent, this.executorSettings());
    if (outcome !== "pending") {
      this.applyTradingEvent(outcome === "done" ? "hedge_done" : "hedge_failed");
    }
  }

  private executorSettings(): ExecutorSettings {
    const { daemon, sizing } = this.config;
    return {
      ackTimeoutMs: daemon.ackTimeoutMs,
      workingTimeoutMs: daemon.workingTimeoutMs,
      maxReprices: daemon.maxReprices,
      brokerTimeoutMs: daemon.brokerTimeoutMs,
      minHedgeShares: sizing.minHedgeShares
    };
  }

  private buildStatus(nowMs: number): StatusSnapshot {
    const config = this.config;
    const cs = this.lastComposite;
    const guardState = this.guard.snapshot();
    const base = {
      version: STATUS_VERSION,
      ts: new Date(nowMs).toISOString(),
      daemonState: this.daemonFsm.current,
      tradingState: this.tradingFsm.current,
      hedgeState: this.hedgeFsm.current,
      symbol: config.eligibility.symbol,
      spot: cs?.spot ?? null,
      bid: cs?.bid ?? null,
      ask: cs?.ask ?? null,
      netDelta: cs && cs.greeksValid ? cs.netDelta : null,
      stockPosition: stockSharesOf(this.positions, config.eligibility.symbol),
      optionLegsCount: cs?.optionLegsCount ?? 0,
      dailyHedgeCount: guardState.dailyHedgeCount,
      dailyPnl: guardState.dailyPnl,
      dataLagMs: cs?.eventLagMs ?? null,
      composite: cs ? dimensionsOf(cs) : null,
      lastGateReason: this.lastGateReason,
      inFlightOrder: this.executor.inFlightOrder(),
      configSummary: summarizeConfig(config)
    };
    const selfCheck = deriveSelfCheck(base, {
      lastHeartbeatMs: this.lastHeartbeatMs,
      nowMs,
      heartbeatIntervalMs: config.daemon.heartbeatIntervalMs,
      brokerConnected: this.broker.isConnected()
    });
    return { ...base, selfCheck };
  }

  private writeStatus(): void {
    try {
      this.sink.writeStatus(this.buildStatus(this.now()));
    } catch (err) {
      this.logger.warn({ msg: "Status snapshot failed", err: errorMessage(err) });
    }
  }
}
