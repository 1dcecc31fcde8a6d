import { z } from "zod";
import { GridfightGame } from "../games";
import { ReplayError } from "../common";

export const RULES_VERSION = "1.8";

const PlayerSchema = z.union([z.literal(1), z.literal(2)]);

export const ReplayMetadataSchema = z.object({
    rulesVersion: z.string().default(RULES_VERSION),
    variant: z.string().default("standard"),
    playerOneName: z.string().default("Player 1"),
    playerTwoName: z.string().default("Player 2"),
    timestamp: z.string().optional(),
});

/**
 * Format v1: the seed and every recorded action. Nothing else is needed to
 * rebuild the game. `winner` is null for an unfinished game.
 */
export const ReplaySchema = z.object({
    formatVersion: z.literal("v1"),
    seed: z.number().int(),
    actions: z.array(z.tuple([PlayerSchema, z.number().int().nonnegative()])),
    metadata: ReplayMetadataSchema.default({}),
    winner: z.union([PlayerSchema, z.literal("draw"), z.null()]).default(null),
});

export type Replay = z.output<typeof ReplaySchema>;
export type ReplayMetadata = z.output<typeof ReplayMetadataSchema>;

export const createReplay = (engine: GridfightGame, metadata: z.input<typeof ReplayMetadataSchema> = {}): Replay => {
    return ReplaySchema.parse({
        formatVersion: "v1",
        seed: engine.seed,
        actions: engine.history.map(([p, i]) => [p, i]),
        metadata,
        winner: engine.getWinner() ?? null,
    });
}

export const replayToJSON = (replay: Replay): string => {
    return JSON.stringify(replay, null, 2);
}

export const replayFromJSON = (json: string): Replay => {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (err) {
        throw new ReplayError(`Replay is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    const result = ReplaySchema.safeParse(raw);
    if (!result.success) {
        const problems = result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new ReplayError(`Invalid replay: ${problems}`);
    }
    return result.data;
}

/**
 * Re-runs every recorded action on a fresh engine with the recorded seed and
 * returns that engine. Dogfights are begun and finished as the actions need.
 */
export const replayGame = (replay: Replay): GridfightGame => {
    const engine = new GridfightGame(replay.seed);
    replay.actions.forEach(([player, index], n) => {
        const where = `Action ${n + 1}`;
        if (engine.isGameOver()) {
            throw new ReplayError(`${where}: the game is already over.`);
        }
        if (engine.phase === "placement") {
            if (player !== engine.currplayer) {
                throw new ReplayError(`${where}: expected player ${engine.currplayer}, got player ${player}.`);
            }
            if (!engine.applyAction(index)) {
                throw new ReplayError(`${where}: ${engine.validateAction(index).message}`);
            }
            return;
        }
        if (!engine.isDogfightActive()) {
            engine.beginDogfight();
        }
        const actor = engine.getDogfightActor();
        if (player !== actor) {
            throw new ReplayError(`${where}: expected player ${actor}, got player ${player}.`);
        }
        if (!engine.applyDogfightTurnAction(player, index)) {
            throw new ReplayError(`${where}: ${engine.validateAction(index, player).message}`);
        }
        if (engine.isDogfightComplete()) {
            engine.finishDogfight();
        }
    });
    const outcome = engine.getWinner() ?? null;
    if (replay.winner !== null && outcome !== replay.winner) {
        throw new ReplayError(`Replay records ${String(replay.winner)} as the winner, but the game ended with ${String(outcome)}.`);
    }
    return engine;
}
