/**
 * 状态管理导出
 *
 * 统一导出所有 Zustand stores
 */

// ============================================
// 会话 Store
// ============================================

export {
  createSessionStore,
  selectIsAuthenticated,
  selectAccount,
  selectProfile,
  type SessionStoreApi,
  type SessionStoreOptions,
} from './sessionStore';
