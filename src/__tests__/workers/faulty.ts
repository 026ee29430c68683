export default (value: number) => {
  if (value < 0) {
    throw new Error(`negative input: ${value}`)
  }
  return value
}

export const rejectLater = async (value: number) => {
  await new Promise((resolve) => setTimeout(resolve, 10))
  if (value < 0) {
    throw new Error(`rejected input: ${value}`)
  }
  return value
}
