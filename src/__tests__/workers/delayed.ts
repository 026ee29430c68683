export type DelayedInput = {
  value: string
  delay: number
}

export default ({ value, delay }: DelayedInput) => new Promise<string>((resolve) => {
  setTimeout(() => resolve(value), delay)
})
