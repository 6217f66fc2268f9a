import { createBrowserRouter, Navigate, type RouteObject } from 'react-router-dom';
import { Layout } from './components';
import Introduction from './pages/Introduction';
import Demo from './pages/Demo';
import History from './pages/History';

export const routes: RouteObject[] = [
    {
        path: '/',
        element: <Layout />,
        children: [
            {
                index: true,
                element: <Introduction />,
            },
            {
                path: 'demo',
                element: <Demo />,
            },
            {
                path: 'history',
                element: <History />,
            },
            {
                path: '*',
                element: <Navigate to="/" replace />,
            },
        ],
    },
];

export const createAppRouter = () => createBrowserRouter(routes);
