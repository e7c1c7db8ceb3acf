export type EnvSource = Readonly<Record<string, string | undefined>>;

export function env(
  key: string,
  defaultValue = "",
  source: EnvSource = process.env
) {
  return String(Reflect.get(source, key) ?? defaultValue).trim();
}
