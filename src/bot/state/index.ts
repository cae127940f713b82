export { MemoryUserStateStore, type UserStateStore } from './userStore';
export { MemorySeenUserStore, type SeenUserStore } from './seenUsers';
export {
    UserState,
    botStateOf,
    botStateApplyText,
    botStateBeginBaseUrlSetup,
    botStateStop,
    normalizeBaseUrl,
    type TextRoute,
} from './machine';
