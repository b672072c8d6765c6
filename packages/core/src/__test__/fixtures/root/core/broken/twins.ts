import {Module} from "../../../../../module.js";

export class Twins extends Module {}

export class Sibling extends Module {}
