/** Rounds to `digits` decimals; exact ties go to the even neighbour (4.25 -> 4.2). */
export const roundTo = (value: number, digits: number): number => {
    const factor = 10 ** digits;
    const scaled = value * factor;
    const floor = Math.floor(scaled);

    if (scaled - floor === 0.5) {
        return (floor % 2 === 0 ? floor : floor + 1) / factor;
    }
    return Math.round(scaled) / factor;
};
