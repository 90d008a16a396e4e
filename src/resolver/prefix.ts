/**
 * Name ↔ path helpers. Pure string functions, no I/O.
 *
 * @module
 */

const SVG_EXTENSION = '.svg';

/**
 * Remove one leading `${prefix}-` from `name`.
 *
 * @example
 * stripPrefix('icon-camera', 'icon');      // 'camera'
 * stripPrefix('icon-icon-camera', 'icon'); // 'icon-camera'
 * stripPrefix('foo-camera', 'icon');       // 'foo-camera'
 */
export function stripPrefix(name: string, prefix: string): string {
    if (prefix === '') return name;
    const head = `${prefix}-`;
    return name.startsWith(head) ? name.slice(head.length) : name;
}

/** Prepend `${prefix}-` unless the prefix is empty. */
export function withPrefix(name: string, prefix: string): string {
    return prefix === '' ? name : `${prefix}-${name}`;
}

/** `solid.camera` → `solid/camera.svg` */
export function nameToRelativePath(name: string): string {
    return `${name.split('.').join('/')}${SVG_EXTENSION}`;
}

/** `solid/camera.svg` → `solid.camera` */
export function relativePathToName(path: string): string {
    const bare = path.endsWith(SVG_EXTENSION) ? path.slice(0, -SVG_EXTENSION.length) : path;
    return bare.split('/').join('.');
}

export function isSvgFile(path: string): boolean {
    return path.endsWith(SVG_EXTENSION);
}
