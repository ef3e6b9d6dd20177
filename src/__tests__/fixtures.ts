import type { Stop, SubwayLineRecord } from "../types.js";

const stop = (id: string, name: string): Stop => ({ id: `place-${id}`, name });

export const ALEWIFE = stop("alewife", "Alewife");
export const DAVIS = stop("davis", "Davis");
export const PORTER = stop("porter", "Porter");
export const HARVARD = stop("harvard", "Harvard");
export const PARK = stop("park", "Park Street");
export const DOWNTOWN = stop("downtown", "Downtown Crossing");
export const SOUTH = stop("south", "South Station");
export const LECHMERE = stop("lechmere", "Lechmere");
export const GOVERNMENT = stop("government", "Government Center");
export const BOYLSTON = stop("boylston", "Boylston");
export const COPLEY = stop("copley", "Copley");
export const OAK_GROVE = stop("oakgrove", "Oak Grove");
export const HAYMARKET = stop("haymarket", "Haymarket");
export const STATE = stop("state", "State");
export const CHINATOWN = stop("chinatown", "Chinatown");
export const WONDERLAND = stop("wonderland", "Wonderland");
export const AQUARIUM = stop("aquarium", "Aquarium");
export const BOWDOIN = stop("bowdoin", "Bowdoin");

// A cut-down downtown: Red has 7 stops, the other three tie at 5.
export const DOWNTOWN_LINES: SubwayLineRecord[] = [
    { id: "Red", name: "Red Line", stops: [ALEWIFE, DAVIS, PORTER, HARVARD, PARK, DOWNTOWN, SOUTH] },
    { id: "Green", name: "Green Line", stops: [LECHMERE, GOVERNMENT, PARK, BOYLSTON, COPLEY] },
    { id: "Orange", name: "Orange Line", stops: [OAK_GROVE, HAYMARKET, STATE, DOWNTOWN, CHINATOWN] },
    { id: "Blue", name: "Blue Line", stops: [WONDERLAND, AQUARIUM, STATE, GOVERNMENT, BOWDOIN] },
];

export function line(id: string, stopIds: string[]): SubwayLineRecord {
    return { id, name: `Line ${id}`, stops: stopIds.map(s => ({ id: s, name: s.toUpperCase() })) };
}
