/**
 * Domain types shared by the client and its callers.
 */

/**
 * Tokens upsd reports in the `ups.status` variable. The server may add others;
 * unknown tokens are kept as plain strings.
 */
export type UpsStatusFlag =
    | 'OL'
    | 'OB'
    | 'LB'
    | 'HB'
    | 'RB'
    | 'CHRG'
    | 'DISCHRG'
    | 'BYPASS'
    | 'CAL'
    | 'OFF'
    | 'OVER'
    | 'TRIM'
    | 'BOOST'
    | 'FSD'
    | 'ALARM'
    | 'TEST'

export const upsStatusDescriptions: Record<UpsStatusFlag, string> = {
    OL: 'On line',
    OB: 'On battery',
    LB: 'Low battery',
    HB: 'High battery',
    RB: 'Replace battery',
    CHRG: 'Charging',
    DISCHRG: 'Discharging',
    BYPASS: 'On bypass',
    CAL: 'Runtime calibration',
    OFF: 'Offline',
    OVER: 'Overloaded',
    TRIM: 'Trimming voltage',
    BOOST: 'Boosting voltage',
    FSD: 'Forced shutdown',
    ALARM: 'Alarm',
    TEST: 'Self test',
}

export function isUpsStatusFlag(flag: string): flag is UpsStatusFlag {
    return Object.prototype.hasOwnProperty.call(upsStatusDescriptions, flag)
}

/**
 * Typed view of the most common UPS variables.
 */
export interface UpsStatus {
    upsName: string
    /** Raw `ups.status`, e.g. "OL CHRG" */
    status?: string
    flags: string[]
    /** The flags listed in `upsStatusDescriptions`; unknown tokens stay in `flags` only */
    knownFlags: UpsStatusFlag[]
    onLine: boolean
    onBattery: boolean
    lowBattery: boolean
    /** % */
    charge?: number
    /** seconds */
    runtimeSeconds?: number
    /** % */
    load?: number
    inputVoltage?: number
    outputVoltage?: number
    batteryVoltage?: number
    manufacturer?: string
    model?: string
    /** Every variable as reported, in server order */
    variables: Map<string, string>
}

/**
 * One `RANGE` row of `LIST RANGE`.
 */
export interface VarRange {
    min: string
    max: string
}
