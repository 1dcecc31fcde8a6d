import { z } from "zod";
import type { GridfightSnapshot, playerid } from "../games";
import { GridfightGame, isFreshDogfight } from "../games";
import { SeededRandom, SimulationError, deriveSeed, mix32, randomSeed, scopedLogger } from "../common";
import { AIBase } from "./_base";
import { sampleHiddenInformation } from "./sampling";

const log = scopedLogger("rollout");

export const RolloutOptionsSchema = z.object({
    name: z.string().min(1).default("Rollout"),
    // playouts per candidate action
    trials: z.number().int().positive().default(50),
    // false: play out sampled worlds instead of the real hidden information
    perfectInformation: z.boolean().default(true),
    samplesPerTrial: z.number().int().positive().default(1),
    evaluateDogfights: z.boolean().default(false),
    // only for breaking ties and the random fallback
    seed: z.number().int().optional(),
}).strict();

export type RolloutOptions = z.input<typeof RolloutOptionsSchema>;
export type ResolvedRolloutOptions = z.output<typeof RolloutOptionsSchema>;

export interface ICandidateScore {
    index: number;
    score: number;
    wins: number;
    draws: number;
    losses: number;
    failures: number;
    total: number;
}

/**
 * Distinct for every decision point of a game: placement turns count up to
 * 18, then each dogfight adds one.
 */
export const decisionContext = (snapshot: GridfightSnapshot): number => {
    return snapshot.turn + snapshot.dogfightIndex;
}

/**
 * Scores each candidate by playing random games to the end from the position
 * it leads to: (wins + draws / 2) / playouts. The best score wins and ties are
 * broken at random.
 *
 * Every playout runs on its own disposable engine seeded from the game seed,
 * the decision point and a slot number unique to the candidate, trial and
 * sample, so a decision is reproducible from the snapshot alone.
 */
export class RolloutAI extends AIBase {
    public readonly name: string;
    public readonly options: ResolvedRolloutOptions;
    public lastScores: ICandidateScore[] = [];
    private rng: SeededRandom;

    constructor(options: RolloutOptions = {}) {
        super();
        this.options = RolloutOptionsSchema.parse(options);
        this.name = this.options.name;
        this.rng = new SeededRandom(this.options.seed ?? randomSeed());
    }

    public selectAction(snapshot: GridfightSnapshot, legal: readonly number[], player: playerid): number {
        if (legal.length === 0) {
            throw new Error(`Player ${player} has no legal actions on turn ${snapshot.turn}. This should never happen.`);
        }
        this.lastScores = [];
        if (legal.length === 1) {
            return legal[0];
        }
        if (snapshot.phase === "placement") {
            return this.search(snapshot, legal, player);
        }
        if (this.canEvaluateDogfight(snapshot, player)) {
            return this.search(snapshot, legal, player);
        }
        return this.rng.pick(legal);
    }

    /**
     * Only the opening move of a fresh dogfight, and only when it is ours.
     */
    public canEvaluateDogfight(snapshot: GridfightSnapshot, player: playerid): boolean {
        if (!this.options.evaluateDogfights || snapshot.phase !== "dogfights" || !isFreshDogfight(snapshot)) {
            return false;
        }
        const df = snapshot.dogfight;
        return df !== null && df.underdog === player && df.actor === player;
    }

    private search(snapshot: GridfightSnapshot, legal: readonly number[], player: playerid): number {
        const scores = legal.map((index, candidate) => this.scoreCandidate(snapshot, index, candidate, player));
        this.lastScores = scores;
        const best = Math.max(...scores.map(s => s.score));
        const top = scores.filter(s => s.score === best);
        log.debug("candidates scored", {turn: snapshot.turn, candidates: scores.length, best, tied: top.length});
        return this.rng.pick(top).index;
    }

    public scoreCandidate(snapshot: GridfightSnapshot, index: number, candidate: number, player: playerid): ICandidateScore {
        const samples = this.options.perfectInformation ? 1 : this.options.samplesPerTrial;
        const trials = this.options.trials;
        const total = trials * samples;
        const context = decisionContext(snapshot);
        const tally: ICandidateScore = {index, score: 0, wins: 0, draws: 0, losses: 0, failures: 0, total};

        for (let trial = 0; trial < trials; trial++) {
            for (let sample = 0; sample < samples; sample++) {
                const slot = (candidate * trials + trial) * samples + sample;
                const seed = deriveSeed(snapshot.seed, context, slot);
                try {
                    const outcome = this.runTrial(snapshot, index, player, seed);
                    if (outcome === player) {
                        tally.wins++;
                    } else if (outcome === "draw") {
                        tally.draws++;
                    } else {
                        tally.losses++;
                    }
                } catch (err) {
                    tally.failures++;
                    tally.draws++;
                    log.debug("trial failed", {index, trial, sample, error: err instanceof Error ? err.message : String(err)});
                }
            }
        }

        tally.score = (tally.wins + 0.5 * tally.draws) / total;
        if (tally.failures * 2 > total) {
            log.warn("most trials failed; scoring the action as neutral", {index, failures: tally.failures, total});
            tally.score = 0.5;
        }
        return tally;
    }

    /**
     * One playout. The sampler and the disposable engine take different seeds
     * derived from the same slot.
     */
    protected runTrial(snapshot: GridfightSnapshot, index: number, player: playerid, seed: number): playerid | "draw" {
        const world = this.options.perfectInformation ? snapshot : sampleHiddenInformation(snapshot, player, seed);
        const g = GridfightGame.fromSnapshot(world, mix32(seed));
        const applied = world.phase === "placement" ? g.applyAction(index) : g.applyDogfightTurnAction(player, index);
        if (!applied) {
            throw new SimulationError(`The simulation rejected action ${index}.`);
        }
        g.playout();
        const outcome = g.getWinner();
        if (outcome === undefined) {
            throw new SimulationError("The playout stopped before the game ended.");
        }
        return outcome;
    }
}
