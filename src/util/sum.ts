/** Add two numbers. */
const sum = (x: number, y: number): number => x + y

export default sum
