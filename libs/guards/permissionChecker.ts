import { getComponentLogger } from '../logging/logger.js';

const logger = getComponentLogger('PermissionChecker');

/**
 * Maps (actor, action, required permissions) to allow/deny.
 */
export interface PermissionChecker {
    check(actorId: string, action: string, required: ReadonlySet<string>): Promise<boolean>;
}

export interface RoleDirectory {
    rolesFor(actorId: string): Promise<readonly string[]>;
    permissionsFor(role: string): Promise<readonly string[]>;
}

/**
 * Static role/permission assignments. Suitable for tests and for services
 * whose role model ships with the deployment.
 */
export class InMemoryRoleDirectory implements RoleDirectory {
    private readonly actorRoles = new Map<string, string[]>();
    private readonly rolePermissions = new Map<string, string[]>();

    constructor(init?: {
        roles?: Record<string, readonly string[]>;
        assignments?: Record<string, readonly string[]>;
    }) {
        for (const [role, permissions] of Object.entries(init?.roles ?? {})) {
            this.rolePermissions.set(role, [...permissions]);
        }
        for (const [actorId, roles] of Object.entries(init?.assignments ?? {})) {
            this.actorRoles.set(actorId, [...roles]);
        }
    }

    assign(actorId: string, role: string): void {
        const roles = this.actorRoles.get(actorId) ?? [];
        if (!roles.includes(role)) roles.push(role);
        this.actorRoles.set(actorId, roles);
    }

    revoke(actorId: string, role: string): void {
        const roles = this.actorRoles.get(actorId);
        if (!roles) return;
        this.actorRoles.set(actorId, roles.filter(r => r !== role));
    }

    async rolesFor(actorId: string): Promise<readonly string[]> {
        return this.actorRoles.get(actorId) ?? [];
    }

    async permissionsFor(role: string): Promise<readonly string[]> {
        return this.rolePermissions.get(role) ?? [];
    }
}

/**
 * Grants a permission when any of the actor's roles holds it, either
 * literally, through a namespace wildcard ("content.*") or through "*".
 */
export function permissionMatches(granted: string, required: string): boolean {
    if (granted === '*' || granted === required) return true;
    if (granted.endsWith('.*')) {
        const prefix = granted.slice(0, -1);
        return required.startsWith(prefix);
    }
    return false;
}

export class RolePermissionChecker implements PermissionChecker {
    constructor(private readonly directory: RoleDirectory) { }

    async check(actorId: string, action: string, required: ReadonlySet<string>): Promise<boolean> {
        if (required.size === 0) return true;

        const roles = await this.directory.rolesFor(actorId);
        const granted = (await Promise.all(roles.map(role => this.directory.permissionsFor(role)))).flat();

        const missing = [...required].filter(permission =>
            !granted.some(g => permissionMatches(g, permission))
        );

        if (missing.length > 0) {
            logger.debug({ actorId, action, roles, missing }, 'Permission check denied');
            return false;
        }

        return true;
    }
}
