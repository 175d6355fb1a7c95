/**
 * Movie id generation: `<name>_<city>` slug, suffixed `_2`, `_3`, ... when taken.
 */

export function movieIdBase(name: string, city: string): string {
  const base = `${name.toLowerCase().replace(/\s+/g, '_')}_${city.toLowerCase().replace(/\s+/g, '_')}`;
  return base.replace(/[^a-z0-9_]/g, '');
}

export function generateMovieId(
  name: string,
  city: string,
  isTaken: (id: string) => boolean,
): string {
  const base = movieIdBase(name, city);
  if (!isTaken(base)) return base;

  let counter = 2;
  while (isTaken(`${base}_${counter}`)) {
    counter++;
  }
  return `${base}_${counter}`;
}
