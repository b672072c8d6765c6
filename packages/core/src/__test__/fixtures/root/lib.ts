import {Library} from "../../../library.js";

export class Fixtures extends Library {}
