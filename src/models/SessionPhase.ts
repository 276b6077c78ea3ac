/**
 * Trading session window models
 */

export type SessionPhase = 'before_open' | 'open' | 'closed';

/** Seconds since local midnight */
export type TimeOfDay = number;

export interface SessionWindow {
  readonly openTime: TimeOfDay;
  readonly closeTime: TimeOfDay;
}

export interface SessionCredentials {
  username: string;
  password: string;
}

export type SessionTransitionType = 'logon' | 'logout';

export interface SessionTransition {
  type: SessionTransitionType;
  from: SessionPhase;
  to: SessionPhase;
  username: string;
  timestamp: Date;
}
