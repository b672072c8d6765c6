import {Module} from "../../../../../module.js";

export class SomethingElse extends Module {}
