export const label = "Shapes"

export const sides = { triangle: 3, square: 4 }
