import { DeepReadonly, SeededRandom, shuffle } from "../../common";
import { IDogfightTurn, IGridfightState, IPlayerResources, IUnit, Position, opponent, playerid } from "./board";
import { Action, ActionCatalog } from "./catalog";

/** A card of this value or higher lets an undefended attack hit. */
export const HIT_THRESHOLD = 7;

/**
 * What a player's weapon ended up meaning once the negotiation closed.
 * The catalog only knows "weapon in slot n"; the role comes from turn order.
 */
export type DogfightPlay =
    | { kind: "pass" }
    | { kind: "offense"; slot: number }
    | { kind: "defense"; slot: number };

export interface IDogfightResult {
    position: Position;
    underdog: playerid;
    plays: Record<playerid, DogfightPlay>;
    winner?: playerid;
    eliminated: playerid[];
    outcome: "single" | "double";
    /** an undefended attack drew high enough to end the fight on its own */
    hit: boolean;
    draws: Record<playerid, number[]>;
}

const unitOf = (units: readonly IUnit[], player: playerid): IUnit => {
    const unit = units.find(u => u.owner === player);
    if (unit === undefined) {
        throw new Error(`Player ${player} has no unit in this dogfight. This should never happen.`);
    }
    return unit;
}

/**
 * Reveals both units and works out who acts first. On equal power the
 * priority holder goes first and the token passes to the other player.
 */
export const openDogfight = (state: IGridfightState, position: Position): IDogfightTurn => {
    const units = state.grid[position[0]][position[1]];
    if (units.length !== 2) {
        throw new Error(`Square [${position[0]},${position[1]}] is not contested. This should never happen.`);
    }
    // showdown
    for (const unit of units) {
        unit.hidden = false;
    }
    const one = unitOf(units, 1);
    const two = unitOf(units, 2);
    let underdog: playerid;
    if (one.power < two.power) {
        underdog = 1;
    } else if (two.power < one.power) {
        underdog = 2;
    } else {
        underdog = state.priority;
        state.priority = opponent(state.priority);
    }
    return {
        position: [position[0], position[1]],
        underdog,
        other: opponent(underdog),
        actor: underdog,
        complete: false,
    };
}

/**
 * Records one action and moves the negotiation on.
 *
 * 1. The underdog opens. A weapon is an attack; either way the other player replies.
 * 2. The other player replies. Against a pending attack any reply closes the round.
 *    Otherwise a weapon becomes the attack and the underdog may answer, and a pass
 *    closes the round.
 * 3. The underdog's answer is final.
 */
export const advanceDogfight = (turn: IDogfightTurn, index: number, action: Readonly<Action>): void => {
    if (turn.first === undefined) {
        turn.first = index;
        if (action.type === "weapon") {
            turn.offense = turn.underdog;
        }
        turn.actor = turn.other;
    } else if (turn.second === undefined) {
        turn.second = index;
        if (turn.offense === turn.underdog) {
            turn.complete = true;
        } else if (action.type === "weapon") {
            turn.offense = turn.other;
            turn.actor = turn.underdog;
        } else {
            turn.complete = true;
        }
    } else {
        turn.third = index;
        turn.complete = true;
    }
}

/**
 * Assigns each player's final role from the recorded turn order.
 */
export const resolvePlays = (turn: DeepReadonly<IDogfightTurn>, catalog: ActionCatalog): Record<playerid, DogfightPlay> => {
    if (!turn.complete || turn.first === undefined || turn.second === undefined) {
        throw new Error("Cannot resolve roles before the dogfight is complete.");
    }
    const slotOf = (index: number | undefined): number | undefined => {
        if (index === undefined) { return undefined; }
        const action = catalog.get(index);
        return action.type === "weapon" ? action.slot : undefined;
    }
    const opening = slotOf(turn.first);
    const reply = slotOf(turn.second);
    const answer = slotOf(turn.third);

    let underdogPlay: DogfightPlay = { kind: "pass" };
    let otherPlay: DogfightPlay = { kind: "pass" };
    if (opening !== undefined) {
        underdogPlay = { kind: "offense", slot: opening };
        if (reply !== undefined) {
            otherPlay = { kind: "defense", slot: reply };
        }
    } else if (reply !== undefined) {
        otherPlay = { kind: "offense", slot: reply };
        if (answer !== undefined) {
            underdogPlay = { kind: "defense", slot: answer };
        }
    }
    if (turn.underdog === 1) {
        return { 1: underdogPlay, 2: otherPlay };
    }
    return { 1: otherPlay, 2: underdogPlay };
}

/**
 * Draws the top resolution card, refilling from the discard pile first if the
 * draw pile is empty. The drawn card goes straight to the discard pile.
 */
export const drawCard = (resources: IPlayerResources, rng: SeededRandom): number => {
    if (resources.drawPile.length === 0) {
        resources.drawPile = shuffle(resources.discard, rng);
        resources.discard = [];
    }
    const card = resources.drawPile.shift();
    if (card === undefined) {
        throw new Error("Both resolution piles are empty. This should never happen.");
    }
    resources.discard.push(card);
    return card;
}

const spendWeapon = (resources: IPlayerResources, play: DogfightPlay): void => {
    if (play.kind === "pass") { return; }
    if (play.slot >= resources.weapons.length) {
        throw new Error(`No weapon in slot ${play.slot}. This should never happen.`);
    }
    resources.weapons.splice(play.slot, 1);
}

/**
 * Settles a completed dogfight: spends the committed weapons, runs the attack
 * and card arithmetic, and removes the eliminated units from the square.
 */
export const resolveDogfight = (state: IGridfightState, turn: DeepReadonly<IDogfightTurn>, catalog: ActionCatalog, rng: SeededRandom): IDogfightResult => {
    const plays = resolvePlays(turn, catalog);
    const [row, col] = turn.position;
    const units = state.grid[row][col];
    const powers: Record<playerid, number> = { 1: unitOf(units, 1).power, 2: unitOf(units, 2).power };
    const draws: Record<playerid, number[]> = { 1: [], 2: [] };
    const draw = (player: playerid): number => {
        const card = drawCard(state.resources[player], rng);
        draws[player].push(card);
        return card;
    }

    spendWeapon(state.resources[1], plays[1]);
    spendWeapon(state.resources[2], plays[2]);

    let eliminated: playerid[] = [];
    let hit = false;
    if (plays[1].kind === "offense" && plays[2].kind === "offense") {
        throw new Error("Both players attacked in the same dogfight. The turn protocol makes this impossible.");
    }
    const attacker: playerid | undefined = plays[1].kind === "offense" ? 1 : plays[2].kind === "offense" ? 2 : undefined;
    if (attacker !== undefined && plays[opponent(attacker)].kind === "pass") {
        // undefended attack
        if (draw(attacker) >= HIT_THRESHOLD) {
            hit = true;
            eliminated = [opponent(attacker)];
        }
    }

    if (!hit) {
        const total1 = powers[1] + draw(1);
        const total2 = powers[2] + draw(2);
        if (total1 > total2) {
            eliminated = [2];
        } else if (total2 > total1) {
            eliminated = [1];
        } else {
            eliminated = [1, 2];
        }
    }

    state.grid[row][col] = units.filter(u => !eliminated.includes(u.owner));
    const survivors = state.grid[row][col];
    return {
        position: [row, col],
        underdog: turn.underdog,
        plays,
        winner: survivors.length === 1 ? survivors[0].owner : undefined,
        eliminated,
        outcome: eliminated.length === 2 ? "double" : "single",
        hit,
        draws,
    };
}
