export const memberKey = (serverId: string, userId: string) =>
  `${serverId}:${userId}`;

export const roleKey = (serverId: string, roleId: string) =>
  `${serverId}:${roleId}`;
