import { accessDeniedMessage, ADMIN_ONLY, isRoleAllowed } from './access-policy';

describe('access policy', () => {
    it('allows only listed roles', () => {
        expect(isRoleAllowed('admin', ADMIN_ONLY)).toBe(true);
        expect(isRoleAllowed('founder', ADMIN_ONLY)).toBe(false);
        expect(isRoleAllowed('ceo', ['admin', 'ceo'])).toBe(true);
    });

    it('names the required roles', () => {
        expect(accessDeniedMessage(['admin'])).toBe('Access denied. Required role: admin');
        expect(accessDeniedMessage(['admin', 'founder'])).toBe('Access denied. Required role: admin, founder');
    });
});
