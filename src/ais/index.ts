import { AIBase } from "./_base";
import { RandomAI } from "./random";
import { HeuristicAI } from "./heuristic";
import { RolloutAI, RolloutOptionsSchema, decisionContext } from "./rollout";
import type { RolloutOptions, ResolvedRolloutOptions, ICandidateScore } from "./rollout";
import { sampleHiddenInformation } from "./sampling";

export type { RolloutOptions, ResolvedRolloutOptions, ICandidateScore };
export { AIBase, RandomAI, HeuristicAI, RolloutAI, RolloutOptionsSchema, decisionContext, sampleHiddenInformation };

export const supportedAgents: string[] = ["random", "heuristic", "rollout", "rollout-fast", "rollout-strong", "rollout-verystrong", "rollout-ultra"];

// trials per candidate for the named rollout presets
export const rolloutPresets: Map<string, RolloutOptions> = new Map([
    ["rollout-fast", {name: "Rollout-Fast", trials: 10, evaluateDogfights: true}],
    ["rollout-strong", {name: "Rollout-Strong", trials: 20}],
    ["rollout-verystrong", {name: "Rollout-VeryStrong", trials: 30}],
    ["rollout-ultra", {name: "Rollout-Ultra", trials: 50}],
]);

// eslint-disable-next-line @typescript-eslint/naming-convention
export const AIFactory = (agent: string, seed?: number): AIBase|undefined => {
    switch (agent) {
        case "random":
            return new RandomAI(seed);
        case "heuristic":
            return new HeuristicAI(seed);
        case "rollout":
            return new RolloutAI({seed});
    }
    const preset = rolloutPresets.get(agent);
    if (preset !== undefined) {
        return new RolloutAI({...preset, seed});
    }
    return;
}
