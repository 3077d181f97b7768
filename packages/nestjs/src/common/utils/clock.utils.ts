import { Inject } from "@nestjs/common";

export const CLOCK = Symbol("clock");

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const InjectClock = () => Inject(CLOCK);
