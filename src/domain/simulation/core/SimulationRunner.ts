import { EventEmitter } from "node:events";
import { inject, injectable } from "inversify";
import type { SimulationConfig } from "@/config/config";
import { TYPES } from "@/config/Types";
import { logger } from "@/infrastructure/utils/logger";
import { LogCategory } from "@/shared/constants/LogEnums";
import { RuleMode, SimulationEventType } from "@/shared/constants/SimulationEnums";
import type { SimulationEventMap } from "@/shared/types/simulation/events";
import type {
  GroupSetupFn,
  Probe,
  SimulationRule,
} from "@/shared/types/simulation/rules";
import { RandomUtils } from "@/shared/utils/RandomUtils";
import {
  AttributeUsageTracker,
  type AttributeUsageReport,
} from "../analysis/AttributeUsageTracker";
import type { Group } from "../entities/Group";
import type { Site } from "../entities/Site";
import { SimulationConstructionError } from "../errors";
import { GroupPopulation } from "../population/GroupPopulation";
import { Timer } from "./Timer";

/**
 * Switches that change how a simulation runs.
 */
export interface SimulationPragmas {
  /** Track attribute usage and report attributes no rule conditioned on. */
  analyze: boolean;
  /** Remove empty groups after every iteration. */
  autocompact: boolean;
  /** Stop early once mass flow stays low. */
  autostop: boolean;
  /** Mass flow below which an iteration counts towards autostop. */
  autostopN: number;
  /** Mass flow proportion below which an iteration counts towards autostop. */
  autostopP: number;
  /** Consecutive low-flow iterations that trigger autostop. */
  autostopT: number;
  fractionalMass: boolean;
  /** Let probes capture the state before the first iteration. */
  probeCaptureInit: boolean;
}

type EventListener<K extends keyof SimulationEventMap> = (
  payload: SimulationEventMap[K],
) => void;

/**
 * Drives a group population through iterations.
 *
 * A simulation is assembled in order: rules first, then groups (and the
 * sites they reference), then probes. `run()` may be called repeatedly;
 * setup happens on the first run only, cleanup after every run.
 */
@injectable()
export class SimulationRunner {
  private readonly emitter = new EventEmitter();
  private readonly rules: SimulationRule[] = [];
  private readonly probes: Probe[] = [];
  private readonly timer: Timer;
  private readonly usageTracker = new AttributeUsageTracker();
  private readonly pragmas: SimulationPragmas;
  private readonly randSeed: number | null;

  private groupSetupFn: GroupSetupFn | null = null;
  private isSetupDone = false;
  private running = false;
  private runCnt = 0;
  private usageReport: AttributeUsageReport | null = null;

  constructor(
    @inject(TYPES.SimulationConfig) config: SimulationConfig,
    @inject(TYPES.GroupPopulation) private readonly pop: GroupPopulation,
  ) {
    this.timer = new Timer(config.timeMin, config.timeMax);
    this.randSeed = config.randSeed;
    this.pragmas = {
      analyze: config.analyze,
      autocompact: config.autocompact,
      autostop: false,
      autostopN: 0,
      autostopP: 0,
      autostopT: 10,
      fractionalMass: config.fractionalMass,
      probeCaptureInit: true,
    };
    this.pop.setFractionalMass(config.fractionalMass);
  }

  public on<K extends keyof SimulationEventMap>(
    event: K,
    listener: EventListener<K>,
  ): this {
    this.emitter.on(event, listener);
    return this;
  }

  public off<K extends keyof SimulationEventMap>(
    event: K,
    listener: EventListener<K>,
  ): this {
    this.emitter.off(event, listener);
    return this;
  }

  private emit<K extends keyof SimulationEventMap>(
    event: K,
    payload: SimulationEventMap[K],
  ): void {
    this.emitter.emit(event, payload);
  }

  // ---- Assembly -------------------------------------------------------------

  /**
   * @throws SimulationConstructionError once the population has groups
   */
  public addRule(rule: SimulationRule): this {
    if (this.pop.getGroupCnt() > 0) {
      throw new SimulationConstructionError(
        "Rules must be added before groups; the population already has groups.",
      );
    }
    this.rules.push(rule);
    logger.debug(`Rule added: ${rule.name}`, LogCategory.RULES);
    return this;
  }

  public addRules(rules: Iterable<SimulationRule>): this {
    for (const r of rules) {
      this.addRule(r);
    }
    return this;
  }

  /**
   * @throws SimulationConstructionError when no rule has been added
   */
  public addGroup(group: Group): this {
    if (this.rules.length === 0) {
      throw new SimulationConstructionError(
        "Groups must be added after rules; no rule has been added yet.",
      );
    }
    this.pop.addGroup(group);
    return this;
  }

  public addGroups(groups: Iterable<Group>): this {
    for (const g of groups) {
      this.addGroup(g);
    }
    return this;
  }

  public addSite(site: Site): this {
    this.pop.addSite(site);
    return this;
  }

  public addSites(sites: Iterable<Site>): this {
    this.pop.addSites(sites);
    return this;
  }

  public addProbe(probe: Probe): this {
    probe.setPopulation(this.pop);
    this.probes.push(probe);
    return this;
  }

  /**
   * Function every group passes through once, before the first iteration.
   */
  public setGroupSetup(fn: GroupSetupFn | null): this {
    this.groupSetupFn = fn;
    return this;
  }

  public setPragma<K extends keyof SimulationPragmas>(
    name: K,
    value: SimulationPragmas[K],
  ): this {
    this.pragmas[name] = value;
    if (name === "fractionalMass") {
      this.pop.setFractionalMass(this.pragmas.fractionalMass);
    }
    return this;
  }

  public getPragma<K extends keyof SimulationPragmas>(
    name: K,
  ): SimulationPragmas[K] {
    return this.pragmas[name];
  }

  public getPopulation(): GroupPopulation {
    return this.pop;
  }

  public getTimer(): Timer {
    return this.timer;
  }

  public getRunCnt(): number {
    return this.runCnt;
  }

  public isRunning(): boolean {
    return this.running;
  }

  /** Attribute-usage report of the most recent analyzed run. */
  public getUsageReport(): AttributeUsageReport | null {
    return this.usageReport;
  }

  // ---- Running --------------------------------------------------------------

  /**
   * Runs the simulation for a number of iterations.
   *
   * Errors raised by rules or by the population abort the run; they are
   * logged and re-thrown.
   */
  public run(iterations: number = 1): this {
    if (!Number.isInteger(iterations) || iterations < 0) {
      throw new RangeError(
        `Number of iterations must be a non-negative integer; got ${iterations}`,
      );
    }
    if (this.rules.length === 0) {
      logger.warn("No rules are present; nothing to run", LogCategory.SIMULATION);
      return this;
    }
    if (this.pop.getGroupCnt() === 0) {
      logger.warn("No groups are present; nothing to run", LogCategory.SIMULATION);
      return this;
    }

    if (this.runCnt === 0 && this.randSeed !== null) {
      RandomUtils.seed(this.randSeed);
    }

    this.running = true;
    this.timer.addIter(iterations);
    try {
      this.runIterations(iterations);
    } catch (error) {
      logger.error("Simulation run aborted", LogCategory.SIMULATION, {
        iter: this.timer.getI(),
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      this.timer.stop();
      this.pop.setUsageObserver(null);
      logger.setIteration(null);
      this.running = false;
    }
    return this;
  }

  private runIterations(iterations: number): void {
    const { pop, rules, timer, pragmas } = this;

    if (pragmas.analyze) {
      pop.setUsageObserver(this.usageTracker);
    }

    this.emit(SimulationEventType.RUN_START, {
      runCnt: this.runCnt + 1,
      iterations,
      mass: pop.getMass(),
      groupCnt: pop.getGroupCnt(),
      siteCnt: pop.getSiteCnt(),
    });

    if (!this.isSetupDone) {
      if (this.groupSetupFn) {
        logger.info("Running group setup", LogCategory.SIMULATION);
        pop.applySetupFn(this.groupSetupFn, timer.getI(), timer.getT());
        pop.postIteration();
      }
      logger.info("Running rule setup", LogCategory.SIMULATION);
      pop.applyRules(rules, timer.getI(), timer.getT(), RuleMode.SETUP);
      pop.postIteration();
      this.isSetupDone = true;
    }

    if (pragmas.autocompact) {
      pop.compact();
    }

    if (pragmas.probeCaptureInit && this.runCnt === 0) {
      for (const p of this.probes) {
        p.run(null, null);
      }
    }

    logger.info(
      `Initial population: mass ${pop.getMass()}, groups ${pop.getGroupCnt()}, sites ${pop.getSiteCnt()}`,
      LogCategory.SIMULATION,
    );

    this.runCnt++;
    let autostopI = 0;
    let done = 0;

    timer.start();
    const n = timer.getILeft();
    for (let k = 0; k < n; k++) {
      const iter = timer.getI();
      const t = timer.getT();
      logger.setIteration(iter);

      pop.applyRules(rules, iter, t);
      pop.postIteration();

      const massFlow = pop.getLastIteration().massFlowTotal;
      const mass = pop.getMass();
      const massFlowProp = mass > 0 ? massFlow / mass : null;

      for (const p of this.probes) {
        p.run(iter, t);
      }

      timer.step();
      done++;
      this.emit(SimulationEventType.ITERATION, {
        iter,
        t,
        mass,
        massFlow,
        groupCnt: pop.getGroupCnt(),
      });

      if (pragmas.autostop && massFlowProp !== null) {
        if (massFlow < pragmas.autostopN || massFlowProp < pragmas.autostopP) {
          autostopI++;
        } else {
          autostopI = 0;
        }

        if (autostopI >= pragmas.autostopT) {
          logger.info(
            `Autostop condition met: mass flow ${massFlow} of ${mass}`,
            LogCategory.SIMULATION,
          );
          this.emit(SimulationEventType.AUTOSTOP, { iter, massFlow, massFlowProp });
          break;
        }
      }

      if (pragmas.autocompact) {
        pop.compact();
      }
    }
    timer.stop();
    logger.setIteration(null);

    this.usageReport = null;
    if (pragmas.analyze) {
      this.usageReport = this.usageTracker.analyze(pop.getGroups());
      pop.setUsageObserver(null);
      const { attrUnused, relUnused } = this.usageReport;
      if (attrUnused.length > 0 || relUnused.length > 0) {
        logger.info(
          "Group attributes and relations no rule conditioned on",
          LogCategory.ANALYSIS,
          { attrUnused, relUnused },
        );
      }
    }

    logger.info("Running rule cleanup", LogCategory.SIMULATION);
    pop.applyRules(rules, timer.getI(), timer.getT(), RuleMode.CLEANUP);
    pop.postIteration();
    if (pragmas.autocompact) {
      pop.compact();
    }

    this.emit(SimulationEventType.RUN_END, {
      runCnt: this.runCnt,
      iterations: done,
      mass: pop.getMass(),
      groupCnt: pop.getGroupCnt(),
      usage: this.usageReport,
    });
  }
}
