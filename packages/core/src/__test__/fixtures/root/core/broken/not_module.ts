export class NotModule {
  hello(): string {
    return "not a module"
  }
}
