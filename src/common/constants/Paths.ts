export default {
  Base: '/api',
  Auth: {
    Base: '/auth',
    Register: '/register',
    Login: '/login',
    Me: '/me',
  },
  Extract: '/extract',
  Extractions: {
    Base: '/extractions',
    One: '/:id',
  },
  Health: '/health',
} as const;
