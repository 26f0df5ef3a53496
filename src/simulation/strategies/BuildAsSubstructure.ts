import type { StructureType } from '../types/simulation';
import type { TopologyHost } from '../network/contracts';
import { StructureGraph } from '../structure/StructureGraph';
import { MirrorStructure } from '../nodes/MirrorStructure';
import { createRuleContext, isValidStructure } from '../nodes/topologyRules';
import { createLogger } from '../utils/logger';
import { TopologyStrategy } from './TopologyStrategy';
import {
  executeDiff,
  planTopologyChange,
  type PlanContext,
  type PlanResult,
  type StructurePlanner,
  type TopologyRequest,
} from './planning';

const logger = createLogger('topology');

// Base for strategies that keep their topology as a structure graph whose
// node ids are mirror ids. Every change is planned on a draft first and only
// a validated draft reaches the mirrors.
export abstract class BuildAsSubstructure extends TopologyStrategy implements StructurePlanner {
  abstract readonly structureType: StructureType;

  protected graph = new StructureGraph();

  abstract buildStructure(graph: StructureGraph, nodeIds: readonly number[], ctx: PlanContext): boolean;

  abstract addNodesToStructure(graph: StructureGraph, nodeIds: readonly number[], ctx: PlanContext): number;

  abstract removeNodesFromStructure(graph: StructureGraph, count: number, ctx: PlanContext): number[];

  // Smallest structure the strategy keeps, when it is stricter than the
  // topology rule's own minimum.
  protected get structureMinSize(): number | undefined {
    return undefined;
  }

  // The whole graph forms one valid substructure under this strategy's head.
  validateStructure(graph: StructureGraph): boolean {
    const headId = this.findStructureHead(graph);
    if (headId === undefined) {
      return false;
    }
    const ctx = createRuleContext(graph, this.structureType, headId, { minSize: this.structureMinSize });
    return ctx.nodes.size === graph.size && isValidStructure(ctx);
  }

  getStructure(): StructureGraph {
    return this.graph;
  }

  getMirrorStructure(host: TopologyHost): MirrorStructure {
    const minSizes: Partial<Record<StructureType, number>> = {};
    const minSize = this.structureMinSize;
    if (minSize !== undefined) minSizes[this.structureType] = minSize;
    return new MirrorStructure(this.graph, (id) => host.getMirror(id), minSizes);
  }

  findStructureHead(graph: StructureGraph = this.graph): number | undefined {
    return graph.nodeIds().find((id) => graph.isHead(id, this.structureType));
  }

  initNetwork(host: TopologyHost, simTime: number): void {
    this.graph = new StructureGraph();
    this.apply(host, { kind: 'build', nodeIds: host.getMirrors().map((mirror) => mirror.id) }, simTime);
  }

  restartNetwork(host: TopologyHost, simTime: number): void {
    host.closeAllLinks(simTime);
    this.initNetwork(host, simTime);
  }

  handleAddNewMirrors(host: TopologyHost, count: number, simTime: number): number {
    const created = Array.from({ length: Math.max(0, count) }, () => host.createMirror(simTime));
    if (this.graph.size === 0) {
      this.apply(host, { kind: 'build', nodeIds: host.getMirrors().map((mirror) => mirror.id) }, simTime);
    } else {
      this.apply(host, { kind: 'add', nodeIds: created.map((mirror) => mirror.id) }, simTime);
    }
    return created.length;
  }

  // Mirrors outside the structure go first, highest id first; the rest is
  // whatever the topology agrees to give up.
  handleRemoveMirrors(host: TopologyHost, count: number, simTime: number): number {
    let removed = 0;
    const loose = host
      .getMirrors()
      .map((mirror) => mirror.id)
      .filter((id) => !this.graph.hasNode(id))
      .sort((a, b) => b - a);
    for (const id of loose) {
      if (removed >= count) break;
      if (host.shutdownMirror(id, simTime)) removed += 1;
    }

    if (removed < count && this.graph.size > 0) {
      const plan = this.apply(host, { kind: 'remove', count: count - removed }, simTime);
      for (const id of plan.diff.removedNodes) {
        if (host.shutdownMirror(id, simTime)) removed += 1;
      }
    }
    return removed;
  }

  protected planContext(host: TopologyHost): PlanContext {
    return { linksPerMirror: host.getNumTargetLinksPerMirror() };
  }

  protected apply(host: TopologyHost, request: TopologyRequest, simTime: number): PlanResult {
    const plan = planTopologyChange(this, this.graph, request, this.planContext(host));
    if (!plan.valid) {
      logger.warn(`${this.kind}: rejected ${request.kind} plan at t=${simTime}`);
    }
    this.graph = plan.graph;
    const result = executeDiff(host, plan.diff, simTime);
    logger.debug(
      `${this.kind}: ${request.kind} applied=${plan.applied} +${result.linksCreated}/-${result.linksRemoved} links`,
    );
    return plan;
  }
}
