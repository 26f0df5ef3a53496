import dotenv from 'dotenv';
import { loadSimProps, readOptionalIntProp, readStringProp } from './simulation/config/props';
import { Network } from './simulation/network/Network';
import { Simulator } from './simulation/engine/Simulator';
import { MirrorProbe, LinkProbe } from './simulation/engine/probes';
import { createTopologyStrategy } from './simulation/strategies/createTopologyStrategy';

dotenv.config();

const props = loadSimProps(process.env.SIM_PROPS?.trim() || 'resources/sim.conf');

const config = {
  numMirrors: readOptionalIntProp(props, 'num_mirrors') ?? 10,
  linksPerMirror: readOptionalIntProp(props, 'links_per_mirror') ?? 2,
  topology: readStringProp(props, 'topology') ?? 'balanced_tree',
  simTime: readOptionalIntProp(props, 'sim_time') ?? 40,
};

const network = new Network({
  strategy: createTopologyStrategy(config.topology),
  numMirrors: config.numMirrors,
  linksPerMirror: config.linksPerMirror,
  props,
});
const simulator = new Simulator(network);
const mirrorProbe = new MirrorProbe();
const linkProbe = new LinkProbe();
simulator.registerProbe(mirrorProbe);
simulator.registerProbe(linkProbe);

// Grow, switch to a full mesh, then shrink back.
const quarter = Math.max(1, Math.floor(config.simTime / 4));
const actions = [
  simulator.effector.setMirrors(config.numMirrors + 4, quarter),
  simulator.effector.setStrategy(createTopologyStrategy('fully_connected'), quarter * 2),
  simulator.effector.setMirrors(config.numMirrors, quarter * 3),
];

for (const action of actions) {
  const { effect } = action;
  console.log(
    `[plan] t=${action.time} ${action.kind} latency=${effect.getLatency()} deltaActiveLinks=${effect
      .getDeltaActiveLinks()
      .toFixed(3)} deltaTtw=${effect.getDeltaTimeToWrite()}`,
  );
}

simulator.onSnapshot((snapshot) => {
  console.log(
    `[t=${snapshot.timeStep}] ${snapshot.topology} mirrors=${snapshot.numReadyMirrors}/${snapshot.numMirrors} ` +
      `links=${snapshot.numActiveLinks}/${snapshot.numTargetLinks} bw=${snapshot.relativeBandwidth}% ttw=${snapshot.relativeTtw}%`,
  );
});

simulator.run(config.simTime);

const last = linkProbe.latest();
console.log(
  `[done] ${mirrorProbe.getSeries().length} ticks, final active links ${last?.numActiveLinks ?? 0}/${last?.numTargetLinks ?? 0}`,
);
