import {Module} from "../../../../../module.js";

export class Circle extends Module {
  radius = 1

  area(): number {
    return Math.PI * this.radius ** 2
  }

  static unit(): Circle {
    return new Circle()
  }
}
